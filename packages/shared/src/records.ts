import { z } from "zod";

export const DEFAULT_SUMMARY_SENTINEL = "[Complete Request Summary]";

export const TurnRole = {
  Requester: "human",
  Responder: "gpt",
} as const;

export type TurnRole = (typeof TurnRole)[keyof typeof TurnRole];

export const turnRoleSchema = z.enum([TurnRole.Requester, TurnRole.Responder]);

export const dialogueTurnSchema = z
  .object({
    from: turnRoleSchema,
    value: z.string(),
  })
  .passthrough();
export type DialogueTurn = z.infer<typeof dialogueTurnSchema>;

/**
 * Outer shape only. Turns stay `unknown` here so the validator can tell a
 * missing field apart from a malformed turn.
 */
export const dialogueRecordShapeSchema = z
  .object({
    system: z.string(),
    conversations: z.array(z.unknown()),
  })
  .passthrough();
export type DialogueRecordShape = z.infer<typeof dialogueRecordShapeSchema>;

export const dialogueRecordSchema = z
  .object({
    system: z.string(),
    conversations: z.array(dialogueTurnSchema),
  })
  .passthrough();
export type DialogueRecord = z.infer<typeof dialogueRecordSchema>;

export const rejectReasonSchema = z.enum([
  "missing-field",
  "malformed-turn",
  "role-mismatch",
  "round-count-mismatch",
  "missing-summary-marker",
]);
export type RejectReason = z.infer<typeof rejectReasonSchema>;

export const alpacaSampleSchema = z
  .object({
    instruction: z.string(),
    input: z.string(),
    output: z.string(),
    system: z.string().optional(),
    history: z.array(z.tuple([z.string(), z.string()])),
  })
  .strict();
export type AlpacaSample = z.infer<typeof alpacaSampleSchema>;
