/**
 * Illustration record type definitions
 */

import { z } from "zod";

/**
 * One catalogue entry as stored in the persisted document.
 *
 * Source fields come from the upstream catalogue; the `_en` fields and
 * `directory_path` are added by the enrichment passes. Unknown keys are kept
 * so that a load/save cycle never drops data the catalogue carries.
 */
export const IllustrationRecordSchema = z.looseObject({
  title: z.string().optional(),
  description: z.string().optional(),
  categories: z.array(z.string()).optional(),
  entry_url: z.string().optional(),
  image_url: z.string().optional(),
  image_alt: z.string().optional(),
  published_at: z.string().optional(),
  title_en: z.string().optional(),
  description_en: z.string().optional(),
  categories_en: z.array(z.string()).optional(),
  image_alt_en: z.string().optional(),
  directory_path: z.string().optional(),
});

export const RecordsDocumentSchema = z.array(IllustrationRecordSchema);

export type IllustrationRecord = z.infer<typeof IllustrationRecordSchema>;

export interface TranslatedFields {
  title_en: string;
  description_en: string;
  categories_en: string[];
  image_alt_en: string;
}
