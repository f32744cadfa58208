/**
 * conf.json schema for a template package.
 *
 * Only `base_template` is recognized; other keys are kept but ignored.
 */
import { z } from "zod";

export const TemplateConfSchema = z
  .object({
    base_template: z.string().min(1).optional(),
  })
  .passthrough();

export type TemplateConf = z.infer<typeof TemplateConfSchema>;
