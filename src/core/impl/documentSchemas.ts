import { z } from "zod";

/** Ids and terms are trie keys; the trie recurses once per character. */
export const MAX_DOC_ID_LENGTH = 512;
export const MAX_TERM_LENGTH = 512;

export const DocIdSchema = z.string().min(1, "document id must not be empty").max(MAX_DOC_ID_LENGTH);
/** `__proto__` cannot be stored as a plain-object key, so it is not a field name. */
export const FieldNameSchema = z
  .string()
  .min(1, "field name must not be empty")
  .refine((name) => name !== "__proto__", "field name is reserved");
export const TermSchema = z.string().min(1).max(MAX_TERM_LENGTH);
