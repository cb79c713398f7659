import { z } from "zod";

import type { JsonValue } from "../types/contracts.js";
import { NODE_KINDS } from "../types/contracts.js";

export const graphNodeSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(NODE_KINDS),
  label: z.string().min(1),
  position: z.object({
    x: z.number().int(),
    y: z.number().int()
  }),
  connections: z.array(z.string().min(1))
});

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);
