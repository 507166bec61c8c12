/**
 * Helper de validacion con Zod para entradas del almacen.
 *
 * Idea:
 * - Validar y normalizar en el borde de cada operacion publica.
 * - Si el schema transforma (p. ej. recorte de textos), aqui queda aplicado y
 *   las tablas pueden asumir registros validos.
 * - Un fallo no lanza: se registra como advertencia y se devuelve `VALIDACION`.
 */
import type { ZodTypeAny, output } from 'zod';
import type { Registrador } from '../../infraestructura/logging/logger';
import { CategoriaFallo, exito, fallo, type Resultado } from '../resultados/tiposResultado';

export function validarEntrada<S extends ZodTypeAny>(
  schema: S,
  valor: unknown,
  contexto: { operacion: string; registro: Registrador }
): Resultado<output<S>> {
  const resultado = schema.safeParse(valor);
  if (!resultado.success) {
    contexto.registro.log('warn', 'Entrada invalida', {
      operacion: contexto.operacion,
      detalles: resultado.error.flatten()
    });
    return fallo(CategoriaFallo.VALIDACION);
  }
  return exito(resultado.data);
}
