/**
 * logger
 *
 * Responsabilidad: Logging estructurado (una linea JSON por evento) del almacen.
 * Limites: No volcar registros completos de alumnos; solo claves y conteos.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

export type Meta = Record<string, unknown>;

/**
 * Contrato minimo que consume el almacen. Permite inyectar un registrador
 * silencioso o espiado en pruebas.
 */
export interface Registrador {
  log(level: NivelLog, msg: string, meta?: Meta): void;
  logError(msg: string, error?: unknown, meta?: Meta): void;
}

const servicio = 'almacen-academico';
const env = process.env.NODE_ENV ?? 'development';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...('codigo' in error && typeof error.codigo === 'string' ? { codigo: error.codigo } : {}),
      ...('detalles' in error && error.detalles !== undefined ? { detalles: error.detalles } : {}),
      stack: error.stack
    };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  const levelStd = nivelEstandar(level);
  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env,
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}

export const registroConsola: Registrador = { log, logError };
