/**
 * Estadisticas de ocupacion del almacen (solo lectura).
 */
import Decimal from 'decimal.js';
import type { AlmacenAcademico, ResumenTabla } from '../../almacenAcademico';
import { registroConsola, type Registrador } from '../../infraestructura/logging/logger';

export type EstadisticaTabla = {
  total: number;
  capacidad: number;
  // Porcentaje con un decimal.
  ocupacionPct: number;
  ruta: string;
  existe: boolean;
};

export type EstadisticasAlmacen = {
  grupos: EstadisticaTabla;
  alumnos: EstadisticaTabla;
};

function resumir(tabla: ResumenTabla): EstadisticaTabla {
  return {
    total: tabla.total,
    capacidad: tabla.capacidad,
    ocupacionPct: new Decimal(tabla.total).mul(100).div(tabla.capacidad).toDecimalPlaces(1).toNumber(),
    ruta: tabla.ruta,
    existe: tabla.existeArchivo
  };
}

export function obtenerEstadisticas(almacen: AlmacenAcademico): EstadisticasAlmacen {
  const { grupos, alumnos } = almacen.resumenTablas();
  return { grupos: resumir(grupos), alumnos: resumir(alumnos) };
}

export function reportarEstadisticas(almacen: AlmacenAcademico, registro: Registrador = registroConsola) {
  const estadisticas = obtenerEstadisticas(almacen);
  registro.log('info', 'Estadisticas del almacen', estadisticas);
  return estadisticas;
}
