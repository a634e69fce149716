import { z } from "zod";
import { Level, parseLevel } from "../core/level.js";

/** A level number (1-6) or any name `parseLevel` understands. */
export const levelSchema = z.union([
  z.nativeEnum(Level),
  z.string().transform((text, ctx) => {
    const level = parseLevel(text);
    if (level === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown level "${text}"` });
      return z.NEVER;
    }
    return level;
  }),
]);

export const overflowSchema = z.enum(["block", "drop", "drop-oldest"]);

export const asyncDrainConfigSchema = z.object({
  capacity: z.number().int().min(1).optional(),
  overflow: overflowSchema.optional(),
  reportDropped: z.boolean().optional(),
  resolveFields: z.boolean().optional(),
  maxWaiting: z.number().int().min(0).optional(),
});

export const loggerConfigSchema = z.object({
  level: levelSchema.optional(),
  captureLocation: z.boolean().optional(),
  module: z.string().min(1).optional(),
  switchable: z.boolean().optional(),
  async: asyncDrainConfigSchema.optional(),
});
