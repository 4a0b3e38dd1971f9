import { z } from 'zod';

export const NO_DATA_PROVIDED = "No data provided";

export const ChatRequestSchema = z.object({
    message: z.string({
        required_error: "No message field in request",
        invalid_type_error: "Message must be a string",
    }).refine(m => m.trim() !== '', { message: "Message cannot be empty" }),
    conversation_id: z.string({ invalid_type_error: "conversation_id must be a string" }).optional(),
    continue_reasoning: z.boolean({ invalid_type_error: "continue_reasoning must be a boolean" }).optional(),
}, { invalid_type_error: "No message field in request" });

export const WhatIfRequestSchema = z.object({
    conversation_id: z.string({
        required_error: "No conversation_id field in request",
        invalid_type_error: "conversation_id must be a string",
    }).refine(id => id.trim() !== '', { message: "conversation_id cannot be empty" }),
    scenario: z.string({
        required_error: "No scenario field in request",
        invalid_type_error: "Scenario must be a string",
    }).refine(s => s.trim() !== '', { message: "Scenario cannot be empty" }),
    assumptions: z.record(z.unknown(), { invalid_type_error: "Assumptions must be an object" }).default({}),
}, { invalid_type_error: "No conversation_id field in request" });

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type WhatIfRequest = z.infer<typeof WhatIfRequestSchema>;

export type BodyValidation<T> =
    | { ok: true; data: T }
    | { ok: false; error: string };

function isEmptyBody(body: unknown): boolean {
    if (!body) {
        return true;
    }
    if (Array.isArray(body)) {
        return body.length === 0;
    }
    return typeof body === 'object' && Object.keys(body).length === 0;
}

/**
 * Validates a parsed JSON body. Reports the first problem found, fields checked in declaration order.
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S, body: unknown): BodyValidation<z.infer<S>> {
    if (isEmptyBody(body)) {
        return { ok: false, error: NO_DATA_PROVIDED };
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        return { ok: false, error: first ? first.message : "Invalid request body" };
    }
    return { ok: true, data: parsed.data };
}
