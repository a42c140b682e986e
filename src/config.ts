import { readFileSync } from "fs";
import { z } from "zod";
import {
  DEFAULT_OUTPUT_DATE_FORMAT,
  isFormatPattern,
  isParsePattern,
} from "./domain/dates";
import { ConfigError, FileLoadError } from "./domain/errors";

const columnName = z.string().trim().min(1);

const columnsSchema = z.object({
  date: columnName,
  type: columnName,
  quantity: columnName,
  price: columnName,
  identifier: columnName,
  currency: columnName.optional(),
});

// Deduplicate while keeping first-seen order
const orderedSet = (values: string[]) => Array.from(new Set(values));

const configSchema = z.object({
  columns: columnsSchema,
  extraIdentificationColumns: z
    .array(columnName)
    .default([])
    .transform(orderedSet),
  buyValues: z
    .array(z.string())
    .min(1, "Select at least one Buy value")
    .transform((values) => new Set(values)),
  sellValues: z
    .array(z.string())
    .min(1, "Select at least one Sell value")
    .transform((values) => new Set(values)),
  roundGains: z.boolean().default(true),
  inputDateFormat: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .refine((value) => value === undefined || isParsePattern(value), {
      message: "Not a usable date-fns parse pattern",
    }),
  outputDateFormat: z
    .string()
    .trim()
    .min(1)
    .default(DEFAULT_OUTPUT_DATE_FORMAT)
    .refine(isFormatPattern, {
      message: "Not a usable date-fns format pattern",
    }),
});

export type FifoConfig = z.output<typeof configSchema>;

/** Validate a raw configuration object, throwing {@link ConfigError} on any issue */
export function validateConfig(raw: unknown): FifoConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

/** Load and validate a JSON configuration file */
export function loadConfig(filePath: string): FifoConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new FileLoadError(filePath, error);
  }
  return validateConfig(raw);
}
