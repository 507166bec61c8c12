/**
 * Modelo Alumno y sus sub-registros (calificaciones, evaluaciones, asistencias).
 *
 * Los topes de evaluaciones y asistencias forman parte del formato del archivo
 * (cada registro reserva todos los espacios), por eso no son configurables.
 */

export const MAX_BYTES_NOMBRE_ALUMNO = 99;
export const MAX_BYTES_COMENTARIO = 499;
export const MAX_EVALUACIONES = 10;
export const MAX_ASISTENCIAS = 50;

export interface Calificaciones {
  np1: number;
  np2: number;
  pim: number;
  promedio: number;
}

export interface Evaluacion {
  puntaje: number;
  comentario: string;
  // DD/MM/YYYY
  fecha: string;
}

export interface Asistencia {
  fecha: string;
  presente: boolean;
}

export interface Alumno {
  grupoId: number;
  matricula: number;
  nombre: string;
  calificaciones: Calificaciones;
  evaluaciones: Evaluacion[];
  asistencias: Asistencia[];
}

export const CALIFICACIONES_VACIAS: Readonly<Calificaciones> = Object.freeze({ np1: 0, np2: 0, pim: 0, promedio: 0 });

export function clonarAlumno(alumno: Alumno): Alumno {
  return {
    ...alumno,
    calificaciones: { ...alumno.calificaciones },
    evaluaciones: alumno.evaluaciones.map((evaluacion) => ({ ...evaluacion })),
    asistencias: alumno.asistencias.map((asistencia) => ({ ...asistencia }))
  };
}
