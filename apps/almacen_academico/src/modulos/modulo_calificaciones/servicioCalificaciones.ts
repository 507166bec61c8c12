/**
 * Calculo de calificaciones de un alumno.
 *
 * El almacen solo reemplaza calificaciones completas; este servicio arma el
 * valor (con su promedio) y hace el ciclo leer -> recalcular -> reemplazar.
 */
import Decimal from 'decimal.js';
import type { AlmacenAcademico } from '../../almacenAcademico';
import { CategoriaFallo, fallo, type ResultadoEscritura } from '../../compartido/resultados/tiposResultado';
import type { Calificaciones } from '../modulo_alumnos/modeloAlumno';

export type NotasParciales = Pick<Calificaciones, 'np1' | 'np2' | 'pim'>;

function aDecimal(valor: number): Decimal {
  return new Decimal(Number.isFinite(valor) ? valor : 0);
}

/** Promedio simple de NP1, NP2 y PIM, redondeado a dos decimales (half-up). */
export function calcularPromedio(np1: number, np2: number, pim: number): number {
  return aDecimal(np1)
    .add(aDecimal(np2))
    .add(aDecimal(pim))
    .div(3)
    .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
    .toNumber();
}

export function armarCalificaciones(np1: number, np2: number, pim: number): Calificaciones {
  return { np1, np2, pim, promedio: calcularPromedio(np1, np2, pim) };
}

/**
 * Aplica un cambio parcial de notas y reemplaza el valor completo con el
 * promedio recalculado.
 */
export function actualizarNotas(
  almacen: AlmacenAcademico,
  matricula: number,
  cambios: Partial<NotasParciales>
): ResultadoEscritura {
  const actuales = almacen.buscarCalificaciones(matricula);
  if (!actuales) return fallo(CategoriaFallo.NO_ENCONTRADO);
  const { np1, np2, pim } = { ...actuales, ...cambios };
  return almacen.guardarCalificaciones(matricula, armarCalificaciones(np1, np2, pim));
}
