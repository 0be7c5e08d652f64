/**
 * @fileoverview Constantes de mensajes de error compartidas entre el núcleo y cualquier capa de presentación.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. El motor deriva de aquí el motivo legible
 * que guarda en lastError de los jobs fallidos (ver describeError en core/engines/errors).
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS: Record<string, string> = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  INVALID_PARAMS: 'Parámetros inválidos',
};

// =====================
// ERRORES DE RESOLUCIÓN (Resolver Adapter)
// =====================

export const RESOLUTION_ERRORS: Record<string, string> = {
  NOT_SUPPORTED: 'La URL no pertenece a ninguna plataforma soportada',
  NETWORK_ERROR: 'Error de red al consultar la plataforma',
  PLATFORM_CHANGED: 'La plataforma cambió su formato y no se pudo extraer el contenido',
  PRIVATE_OR_REMOVED: 'El contenido es privado o fue eliminado',
  CANCELLED: 'Resolución cancelada',
};

// =====================
// ERRORES DE TRANSFERENCIA (Transfer Engine)
// =====================

export const TRANSFER_ERRORS: Record<string, string> = {
  NETWORK_ERROR: 'Error de red durante la descarga',
  DISK_FULL: 'Espacio insuficiente en disco',
  PERMISSION_DENIED: 'No se puede escribir el archivo en el destino',
  SERVER_REJECTED_RANGE: 'El servidor rechazó el rango pedido para reanudar',
  CORRUPT: 'Los datos recibidos no coinciden con lo esperado',
};

// =====================
// ERRORES DEL SCHEDULER
// =====================

export const SCHEDULER_ERRORS: Record<string, string> = {
  DESTINATION_UNWRITABLE: 'No se puede escribir en la carpeta de destino',
  DUPLICATE_SUBMISSION: 'La descarga ya está en la cola',
  JOB_NOT_FOUND: 'No existe un job con ese id',
  INVALID_TRANSITION: 'Transición de estado no permitida',
};

// =====================
// ERRORES DE SISTEMA
// =====================

export const SYSTEM_ERRORS: Record<string, string> = {
  PERSISTENCE_CORRUPT: 'El estado persistido de la cola está dañado',
};

// =====================
// ERRORES DE CONFIGURACIÓN
// =====================

export const SETTINGS_ERRORS: Record<string, string> = {
  LOAD_FAILED: 'Error cargando configuración',
  SAVE_FAILED: 'Error guardando configuración',
  INVALID: 'Configuración inválida, se usan los valores por defecto',
};

// =====================
// OBJETO UNIFICADO
// =====================

/** Objeto unificado de errores por categoría. */
export interface ErrorsMap {
  GENERAL: Record<string, string>;
  RESOLUTION: Record<string, string>;
  TRANSFER: Record<string, string>;
  SCHEDULER: Record<string, string>;
  SYSTEM: Record<string, string>;
  SETTINGS: Record<string, string>;
}

export const ERRORS: ErrorsMap = {
  GENERAL: GENERAL_ERRORS,
  RESOLUTION: RESOLUTION_ERRORS,
  TRANSFER: TRANSFER_ERRORS,
  SCHEDULER: SCHEDULER_ERRORS,
  SYSTEM: SYSTEM_ERRORS,
  SETTINGS: SETTINGS_ERRORS,
};

export default ERRORS;
