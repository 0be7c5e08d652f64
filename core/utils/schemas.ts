/**
 * @fileoverview Schemas Zod del núcleo: envío de descargas, ids, concurrencia, filas
 * persistidas, ajustes de usuario y JSON del extractor externo.
 * @module schemas
 */

import { z } from 'zod';
import { MAX_FILENAME_LENGTH, MAX_PATH_LENGTH, MAX_URL_LENGTH, VALIDATIONS } from '../constants/validations';
import { JOB_PRIORITIES, JOB_STATUSES, type JobPriorityLevel, type JobStatusType } from '../../shared/constants/queue';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const urlSchema = z
  .string({ required_error: VALIDATIONS.URL.REQUIRED })
  .trim()
  .min(1, VALIDATIONS.URL.REQUIRED)
  .max(MAX_URL_LENGTH, VALIDATIONS.URL.TOO_LONG)
  .url(VALIDATIONS.URL.INVALID)
  .refine(val => /^https?:\/\//i.test(val), VALIDATIONS.URL.PROTOCOL);

const destinationDirSchema = z
  .string()
  .trim()
  .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
  .max(MAX_PATH_LENGTH, VALIDATIONS.PATH.TOO_LONG);

const prioritySchema = z
  .number()
  .int(VALIDATIONS.JOB.PRIORITY_INVALID)
  .refine((val): val is JobPriorityLevel => (JOB_PRIORITIES as readonly number[]).includes(val), VALIDATIONS.JOB.PRIORITY_INVALID);

const statusSchema = z
  .string()
  .refine((val): val is JobStatusType => (JOB_STATUSES as readonly string[]).includes(val));

/** Selector de variante: política con nombre, formato exacto, etiqueta de resolución o altura máxima. */
export const variantSelectorSchema = z.union([
  z.literal('best'),
  z.literal('smallest'),
  z.object({ formatId: z.string().min(1) }).strict(),
  z.object({ resolution: z.string().min(1) }).strict(),
  z
    .object({ maxHeight: z.number().int().positive(), container: z.string().min(1).optional() })
    .strict(),
]);

export type VariantSelector = z.infer<typeof variantSelectorSchema>;

export const submitParamsSchema = z.object({
  url: urlSchema,
  destinationDir: destinationDirSchema.optional(),
  priority: prioritySchema.optional(),
  selector: variantSelectorSchema.optional(),
  fileName: z
    .string()
    .trim()
    .min(1, VALIDATIONS.FILE.FILENAME_CANNOT_BE_EMPTY)
    .max(MAX_FILENAME_LENGTH, VALIDATIONS.FILE.FILENAME_TOO_LONG)
    .optional(),
});

export type SubmitParams = z.infer<typeof submitParamsSchema>;

export const playlistParamsSchema = z.object({
  url: urlSchema,
  destinationDir: destinationDirSchema.optional(),
  priority: prioritySchema.optional(),
  selector: variantSelectorSchema.optional(),
  maxEntries: z.number().int().positive().max(1000).optional(),
});

export type PlaylistParams = z.infer<typeof playlistParamsSchema>;

const jobIdSchema = z.string().uuid(VALIDATIONS.JOB.ID_INVALID);

const concurrencySchema = z.number().int(VALIDATIONS.JOB.CONCURRENCY_INVALID).positive(VALIDATIONS.JOB.CONCURRENCY_INVALID);

const fetchDescriptorSchema = z.object({
  url: z.string().min(1),
  headers: z.record(z.string(), z.string()),
  cookies: z.string().optional(),
});

export const mediaVariantSchema = z.object({
  sourceUrl: z.string().min(1),
  formatId: z.string().min(1),
  container: z.string(),
  resolutionLabel: z.string(),
  estimatedSizeBytes: z.number().nonnegative().nullable(),
  fetchDescriptor: fetchDescriptorSchema,
  mediaKind: z.enum(['video', 'audio', 'photo']),
  title: z.string().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

/** Fila de la tabla jobs tal como la devuelve better-sqlite3. */
export const persistedJobRowSchema = z.object({
  id: z.string().min(1),
  source_url: z.string().min(1),
  variant_json: z.string().nullable(),
  destination_dir: z.string().min(1),
  destination_path: z.string().nullable(),
  status: statusSchema,
  bytes_downloaded: z.number().int().nonnegative(),
  bytes_total: z.number().int().nonnegative().nullable(),
  priority: prioritySchema,
  retry_count: z.number().int().nonnegative(),
  last_error: z.string().nullable(),
  enqueue_seq: z.number().int().nonnegative(),
  created_at: z.number().int(),
  updated_at: z.number().int(),
});

export type PersistedJobRow = z.infer<typeof persistedJobRowSchema>;

/** Un formato del JSON de `yt-dlp -J`. Solo los campos que se usan. */
export const extractorFormatSchema = z
  .object({
    format_id: z.string(),
    url: z.string().optional(),
    ext: z.string().optional(),
    vcodec: z.string().nullable().optional(),
    acodec: z.string().nullable().optional(),
    width: z.number().nullable().optional(),
    height: z.number().nullable().optional(),
    filesize: z.number().nullable().optional(),
    filesize_approx: z.number().nullable().optional(),
    format_note: z.string().nullable().optional(),
    http_headers: z.record(z.string(), z.string()).optional(),
    cookies: z.string().optional(),
  })
  .passthrough();

export const extractorInfoSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().optional(),
    webpage_url: z.string().optional(),
    url: z.string().optional(),
    ext: z.string().optional(),
    _type: z.string().optional(),
    formats: z.array(extractorFormatSchema).optional(),
    entries: z
      .array(
        z
          .object({
            url: z.string().optional(),
            webpage_url: z.string().optional(),
            title: z.string().optional(),
          })
          .passthrough()
          .nullable()
      )
      .optional(),
    http_headers: z.record(z.string(), z.string()).optional(),
    filesize: z.number().nullable().optional(),
    width: z.number().nullable().optional(),
    height: z.number().nullable().optional(),
  })
  .passthrough();

export type ExtractorInfo = z.infer<typeof extractorInfoSchema>;
export type ExtractorFormat = z.infer<typeof extractorFormatSchema>;

export const userSettingsSchema = z.object({
  video: z.object({
    /** "Best Available" o una etiqueta de altura como "720p". */
    resolution: z.string().min(1),
    /** Entradas de una playlist a descargar si all es false. */
    count: z.number().int().positive(),
    all: z.boolean(),
  }),
  photo: z.object({
    quality: z.string().min(1),
  }),
  download: z.object({
    /** "Best" o un contenedor preferido ("mp4", "webm"…). */
    extension: z.string().min(1),
    videoPath: z.string(),
    photoPath: z.string(),
    writeMetadata: z.boolean(),
  }),
  system: z.object({
    threads: concurrencySchema.max(10),
    maxRetries: z.number().int().nonnegative().max(10),
  }),
});

export type UserSettings = z.infer<typeof userSettingsSchema>;

/** Cambios parciales por sección (lo que se lee de settings.json o llega a save()). */
export const settingsPatchSchema = z.object({
  video: userSettingsSchema.shape.video.partial().optional(),
  photo: userSettingsSchema.shape.photo.partial().optional(),
  download: userSettingsSchema.shape.download.partial().optional(),
  system: userSettingsSchema.shape.system.partial().optional(),
});

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ZodValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }
  const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
    const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
    return `${pathStr}${err.message}`;
  });

  return {
    success: false,
    error: errorMessages.join('; '),
  };
}

export function validateSubmitParams(params: unknown): ZodValidationResult<SubmitParams> {
  return validate(submitParamsSchema, params);
}

export function validatePlaylistParams(params: unknown): ZodValidationResult<PlaylistParams> {
  return validate(playlistParamsSchema, params);
}

export function validateJobId(jobId: unknown): ZodValidationResult<string> {
  return validate(jobIdSchema, jobId);
}

export function validateConcurrency(value: unknown): ZodValidationResult<number> {
  return validate(concurrencySchema, value);
}

export function validateSettingsPatch(patch: unknown): ZodValidationResult<SettingsPatch> {
  return validate(settingsPatchSchema, patch);
}

export function validatePriority(value: unknown): ZodValidationResult<JobPriorityLevel> {
  return validate(prioritySchema, value);
}
