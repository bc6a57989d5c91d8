/**
 * Zod schemas for site configuration files.
 *
 * A site configuration is a JSON object that doubles as the root render
 * context: every key is visible to templates, and four keys also steer
 * generation.
 *
 *   {
 *     "template_path": "templates",   // where templates live
 *     "template": "base.html",        // template to render
 *     "outpath": "output",            // output directory
 *     "render": "index.html",         // output file name
 *     "title": "My site",             // …anything else is context
 *     "posts": [{ "title": "Hello" }]
 *   }
 */

import { z } from "zod";
import type { ContextMapping, ContextValue } from "../../engine/context.js";

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(ContextValueSchema),
  ])
);

export const ContextMappingSchema = z
  .record(ContextValueSchema)
  .refine((value) => Object.keys(value).length > 0, {
    message: "Site configuration is empty",
  });

export const SiteSettingsSchema = z.object({
  outpath: z.string().min(1).default("output"),
  render: z.string().min(1).default("render.html"),
  template_path: z.string().min(1).default("templates"),
  template: z.string().min(1).default("base.html"),
});

export type SiteSettings = z.infer<typeof SiteSettingsSchema>;

export interface SiteConfig {
  readonly settings: Readonly<SiteSettings>;
  /** The whole file, as the root render context. */
  readonly context: ContextMapping;
}
