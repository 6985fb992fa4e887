// Bayeux wire schemas for TypeScript.
//
// The protocol does not tag responses, so each variant is described by the
// fields it requires. A schema matches when every required field is present
// with the right type; optional and unknown fields are ignored.

import { z } from "zod";

import type {
  BasicResponse,
  BayeuxResponse,
  DeliveryResponse,
  ErroredResponse,
  HandshakeResponse,
  PublishResponse,
} from "./types.ts";

// ============================================================================
// Field Schemas
// ============================================================================

/** Any JSON value except a missing one. `null` counts as present. */
const present = z.custom<{} | null>((value) => value !== undefined, {
  message: "Required",
});

const ExtSchema = z.record(z.unknown());

/** Servers echo the request id, some of them as a number. */
const IdSchema = z.union([z.string(), z.number()]).transform((id) => String(id));

export const ReconnectSchema = z.enum(["retry", "handshake", "none"]);

export const AdviceSchema = z.object({
  reconnect: ReconnectSchema.optional(),
  timeout: z.number().optional(),
  interval: z.number().optional(),
  multipleClients: z.boolean().optional(),
  hosts: z.array(z.string()).optional(),
});

const common = {
  channel: z.string(),
  advice: AdviceSchema.optional(),
  ext: ExtSchema.optional(),
  id: IdSchema.optional(),
};

// ============================================================================
// Response Schemas
// ============================================================================

/**
 * Errored: an explicit failure with a reason.
 *
 * Checked first: every Errored message would also pass as Basic.
 */
export const ErroredSchema = z
  .object({
    ...common,
    successful: z.literal(false),
    error: z.string(),
    clientId: z.string().optional(),
    subscription: z.string().optional(),
  })
  .transform((fields): ErroredResponse => ({ tag: "Errored", ...fields }));

export const HandshakeSchema = z
  .object({
    ...common,
    successful: z.boolean(),
    error: z.string().optional(),
    version: z.string(),
    minimumVersion: z.string().optional(),
    clientId: z.string(),
    supportedConnectionTypes: z.array(z.string()),
    authSuccessful: z.boolean().optional(),
  })
  .transform((fields): HandshakeResponse => ({ tag: "Handshake", ...fields }));

export const PublishSchema = z
  .object({
    ...common,
    clientId: z.string(),
    successful: z.boolean(),
    error: z.string().optional(),
    data: present,
  })
  .transform((fields): PublishResponse => ({ tag: "Publish", ...fields }));

/** Delivery: carries `data` and must not carry `successful`. */
export const DeliverySchema = z
  .object({
    ...common,
    successful: z.undefined(),
    data: present,
    clientId: z.string().optional(),
  })
  .transform(
    ({ successful: _successful, ...fields }): DeliveryResponse => ({ tag: "Delivery", ...fields }),
  );

export const BasicSchema = z
  .object({
    ...common,
    successful: z.boolean(),
    error: z.string().optional(),
    clientId: z.string().optional(),
    subscription: z.string().optional(),
  })
  .transform((fields): BasicResponse => ({ tag: "Basic", ...fields }));

/** A schema that turns one untagged wire object into a tagged response. */
export type ResponseClassifier = z.ZodType<BayeuxResponse, z.ZodTypeDef, unknown>;

/**
 * Response schemas in classification priority order. First match wins.
 */
export const RESPONSE_CLASSIFIERS: readonly ResponseClassifier[] = [
  ErroredSchema,
  HandshakeSchema,
  PublishSchema,
  DeliverySchema,
  BasicSchema,
];

/**
 * Classify one wire object. Returns null when no shape matches.
 */
export function classifyResponse(value: unknown): BayeuxResponse | null {
  for (const schema of RESPONSE_CLASSIFIERS) {
    const result = schema.safeParse(value);
    if (result.success) {
      return result.data;
    }
  }
  return null;
}
