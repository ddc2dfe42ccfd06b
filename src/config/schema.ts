// pattern: Functional Core
import { z } from "zod";
import { BACKEND_KINDS } from "@/web/types.ts";

const SearchConfigSchema = z.object({
  backend: z.enum(BACKEND_KINDS).default("metaphor"),
  max_results: z.number().int().positive().default(10),
  search_timeout: z.number().int().positive().default(30000),
});

const NormalizeConfigSchema = z
  .object({
    max_content_length: z.number().int().positive().default(3500),
    max_summary_length: z.number().int().positive().default(300),
    fetch_timeout: z.number().int().positive().default(10000),
    concurrency: z.number().int().positive().default(4),
    extraction: z.enum(["text", "readability"]).default("text"),
  })
  .superRefine((data, ctx) => {
    if (data.max_summary_length > data.max_content_length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "max_summary_length cannot exceed max_content_length",
        path: ["max_summary_length"],
      });
    }
  });

const AppConfigSchema = z.object({
  search: SearchConfigSchema.default({}),
  normalize: NormalizeConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type NormalizeConfig = z.infer<typeof NormalizeConfigSchema>;

export { AppConfigSchema, SearchConfigSchema, NormalizeConfigSchema };
