/**
 * Tipos de resultado de las operaciones del almacen.
 *
 * Ninguna operacion publica lanza: el exito o la causa del fallo viajan en el
 * valor de retorno.
 */

export enum CategoriaFallo {
  NO_ENCONTRADO = 'no_encontrado',
  CONFLICTO = 'conflicto',
  CAPACIDAD_EXCEDIDA = 'capacidad_excedida',
  VALIDACION = 'validacion'
}

/**
 * `durable`: todos los archivos afectados quedaron escritos.
 * `solo_memoria`: el cambio se aplico en memoria pero algun volcado fallo; no
 * hay rollback y el siguiente volcado exitoso lo hace durable.
 */
export type EstadoPersistencia = 'durable' | 'solo_memoria';

export type Fallo = { ok: false; motivo: CategoriaFallo };

/** Resultado interno de las tablas en memoria. */
export type Resultado<T> = { ok: true; valor: T } | Fallo;

export type ResultadoEscritura<E extends object = object> =
  | ({ ok: true; persistencia: EstadoPersistencia } & E)
  | Fallo;

// Registro leido de disco que no entro en la tabla (clave repetida o tabla llena).
export type RechazoCarga = { clave: number; motivo: CategoriaFallo };

export function exito<T>(valor: T): Resultado<T> {
  return { ok: true, valor };
}

export function fallo(motivo: CategoriaFallo): Fallo {
  return { ok: false, motivo };
}

export function estadoPersistencia(...escrituras: boolean[]): EstadoPersistencia {
  return escrituras.every(Boolean) ? 'durable' : 'solo_memoria';
}
