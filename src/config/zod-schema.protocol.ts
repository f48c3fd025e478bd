import { z } from "zod";

export const ProtocolSchema = z
  .object({
    capacityBytes: z.number().int().positive().optional(),
    pretty: z.boolean().optional(),
  })
  .strict();
