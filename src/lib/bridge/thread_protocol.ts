// Messages exchanged between ThreadHost and a backend thread.
// Both directions are validated: structured clone keeps the shape, not the type.

import { z } from "zod";

export const ThreadRequestSchema = z.object({
  id: z.number().int(),
  method: z.string(),
  args: z.array(z.unknown()),
  traceId: z.string().optional(),
});

export const RemoteErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z.string().optional(),
});

export const ThreadReplySchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number().int(), ok: z.literal(true), value: z.unknown() }),
  z.object({ id: z.number().int(), ok: z.literal(false), error: RemoteErrorSchema }),
]);

export type ThreadRequest = z.infer<typeof ThreadRequestSchema>;
export type RemoteError = z.infer<typeof RemoteErrorSchema>;
export type ThreadReply = z.infer<typeof ThreadReplySchema>;
