/**
 * @fileoverview Constantes de validación: límites numéricos y mensajes de error de validación.
 * @module constants/validations
 *
 * Usado en los schemas Zod (utils/schemas) y en la sanitización de nombres de archivo.
 */

// =====================
// LÍMITES NUMÉRICOS
// =====================

/** Longitud máxima (en caracteres) del fileName aceptado en el envío. */
export const MAX_FILENAME_LENGTH = 255;

/** Límite de nombre de archivo en disco, en bytes UTF-8 (ext4, APFS, NTFS...). */
export const MAX_FILENAME_BYTES = 255;

/** Bytes reservados para el sufijo de colisión " (n)". */
export const COLLISION_SUFFIX_RESERVE_BYTES = 8;

/** Longitud máxima de URL aceptada en el envío. */
export const MAX_URL_LENGTH = 4096;

/** Longitud máxima de ruta de destino. */
export const MAX_PATH_LENGTH = 1000;

// =====================
// MENSAJES
// =====================

const URL_VALIDATIONS: Record<string, string> = {
  REQUIRED: 'La URL es obligatoria',
  INVALID: 'La URL no es válida',
  PROTOCOL: 'Solo se aceptan URLs http o https',
  TOO_LONG: 'La URL es demasiado larga',
};

const PATH_VALIDATIONS: Record<string, string> = {
  CANNOT_BE_EMPTY: 'La carpeta de destino no puede estar vacía',
  TOO_LONG: 'La ruta es demasiado larga',
};

const JOB_VALIDATIONS: Record<string, string> = {
  ID_INVALID: 'El id del job no es válido',
  PRIORITY_INVALID: 'La prioridad debe ser 0 (baja), 1 (normal) o 2 (alta)',
  CONCURRENCY_INVALID: 'La concurrencia debe ser un entero positivo',
};

const FILE_VALIDATIONS: Record<string, string> = {
  FILENAME_CANNOT_BE_EMPTY: 'El nombre de archivo no puede estar vacío',
  FILENAME_TOO_LONG: 'El nombre de archivo es demasiado largo',
};

export const VALIDATIONS = {
  URL: URL_VALIDATIONS,
  PATH: PATH_VALIDATIONS,
  JOB: JOB_VALIDATIONS,
  FILE: FILE_VALIDATIONS,
};

export default VALIDATIONS;
