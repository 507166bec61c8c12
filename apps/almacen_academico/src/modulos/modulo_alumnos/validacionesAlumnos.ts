/**
 * Validaciones de alumnos y sus sub-registros.
 */
import { z } from 'zod';
import { esquemaClaveEntera, esquemaFecha, esquemaPuntaje, esquemaTextoFijo } from '../../compartido/validaciones/esquemas';
import {
  CALIFICACIONES_VACIAS,
  MAX_ASISTENCIAS,
  MAX_BYTES_COMENTARIO,
  MAX_BYTES_NOMBRE_ALUMNO,
  MAX_EVALUACIONES
} from './modeloAlumno';

export const esquemaMatricula = esquemaClaveEntera;

export const esquemaNombreAlumno = esquemaTextoFijo(MAX_BYTES_NOMBRE_ALUMNO);

export const esquemaCalificaciones = z
  .object({
    np1: esquemaPuntaje,
    np2: esquemaPuntaje,
    pim: esquemaPuntaje,
    promedio: esquemaPuntaje
  })
  .strict();

export const esquemaEvaluacion = z
  .object({
    puntaje: esquemaPuntaje,
    comentario: esquemaTextoFijo(MAX_BYTES_COMENTARIO),
    fecha: esquemaFecha
  })
  .strict();

export const esquemaAsistencia = z
  .object({
    fecha: esquemaFecha,
    presente: z.boolean()
  })
  .strict();

// Un alumno nuevo puede llegar sin sub-registros: se completan vacios.
export const esquemaAlumno = z
  .object({
    grupoId: esquemaClaveEntera,
    matricula: esquemaMatricula,
    nombre: esquemaNombreAlumno,
    calificaciones: esquemaCalificaciones.default({ ...CALIFICACIONES_VACIAS }),
    evaluaciones: z.array(esquemaEvaluacion).max(MAX_EVALUACIONES).default([]),
    asistencias: z.array(esquemaAsistencia).max(MAX_ASISTENCIAS).default([])
  })
  .strict();

export type EntradaAlumno = z.input<typeof esquemaAlumno>;

export const esquemaCambioMatricula = z.object({
  anterior: esquemaMatricula,
  nueva: esquemaMatricula
});
