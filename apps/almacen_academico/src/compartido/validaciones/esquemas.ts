// Esquemas Zod reutilizables (campos de registro de tamano fijo).
import { z } from 'zod';
import { esFechaValida, truncarBytes } from '../utilidades/texto';

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

// Claves enteras: el archivo las guarda como int32.
export const esquemaClaveEntera = z.number().int().min(INT32_MIN).max(INT32_MAX);

export const esquemaPuntaje = z.number().finite();

// Texto de campo fijo: se recorta a `maxBytes` en lugar de rechazarse.
export function esquemaTextoFijo(maxBytes: number) {
  return z.string().transform((valor) => truncarBytes(valor, maxBytes));
}

export const esquemaFecha = z.string().refine(esFechaValida, { message: 'Fecha invalida. Formato esperado: DD/MM/YYYY' });
