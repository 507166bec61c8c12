/**
 * Layout binario de Alumno (5938 bytes).
 *
 *    0  int32          grupoId
 *    4  int32          matricula
 *    8  char[100]      nombre
 *  108  float64 x 4    np1, np2, pim, promedio
 *  140  Evaluacion x10 (float64 puntaje, char[500] comentario, char[11] fecha)
 * 5330  Asistencia x50 (char[11] fecha, uint8 presente)
 * 5930  int32          numEvaluaciones
 * 5934  int32          numAsistencias
 *
 * Los espacios sin usar se escriben en cero. Los puntajes van en float64 para
 * que el valor releido sea identico al que habia en memoria.
 */
import { leerTexto, escribirTexto, type CodecRegistro } from '../../infraestructura/archivos/codecBinario';
import {
  MAX_ASISTENCIAS,
  MAX_BYTES_COMENTARIO,
  MAX_BYTES_NOMBRE_ALUMNO,
  MAX_EVALUACIONES,
  type Alumno,
  type Asistencia,
  type Evaluacion
} from './modeloAlumno';

const CAMPO_NOMBRE = MAX_BYTES_NOMBRE_ALUMNO + 1;
const CAMPO_COMENTARIO = MAX_BYTES_COMENTARIO + 1;
const CAMPO_FECHA = 11;

const TAMANO_EVALUACION = 8 + CAMPO_COMENTARIO + CAMPO_FECHA;
const TAMANO_ASISTENCIA = CAMPO_FECHA + 1;

const OFFSET_NOMBRE = 8;
const OFFSET_CALIFICACIONES = OFFSET_NOMBRE + CAMPO_NOMBRE;
const OFFSET_EVALUACIONES = OFFSET_CALIFICACIONES + 4 * 8;
const OFFSET_ASISTENCIAS = OFFSET_EVALUACIONES + MAX_EVALUACIONES * TAMANO_EVALUACION;
const OFFSET_CONTADORES = OFFSET_ASISTENCIAS + MAX_ASISTENCIAS * TAMANO_ASISTENCIA;

function acotar(valor: number, maximo: number) {
  return Math.max(0, Math.min(valor, maximo));
}

function escribirEvaluacion(buffer: Buffer, offset: number, evaluacion: Evaluacion) {
  buffer.writeDoubleLE(evaluacion.puntaje, offset);
  escribirTexto(buffer, offset + 8, evaluacion.comentario, CAMPO_COMENTARIO);
  escribirTexto(buffer, offset + 8 + CAMPO_COMENTARIO, evaluacion.fecha, CAMPO_FECHA);
}

function leerEvaluacion(buffer: Buffer, offset: number): Evaluacion {
  return {
    puntaje: buffer.readDoubleLE(offset),
    comentario: leerTexto(buffer, offset + 8, CAMPO_COMENTARIO),
    fecha: leerTexto(buffer, offset + 8 + CAMPO_COMENTARIO, CAMPO_FECHA)
  };
}

function escribirAsistencia(buffer: Buffer, offset: number, asistencia: Asistencia) {
  escribirTexto(buffer, offset, asistencia.fecha, CAMPO_FECHA);
  buffer.writeUInt8(asistencia.presente ? 1 : 0, offset + CAMPO_FECHA);
}

function leerAsistencia(buffer: Buffer, offset: number): Asistencia {
  return {
    fecha: leerTexto(buffer, offset, CAMPO_FECHA),
    presente: buffer.readUInt8(offset + CAMPO_FECHA) !== 0
  };
}

export const codecAlumno: CodecRegistro<Alumno> = {
  tamano: OFFSET_CONTADORES + 8,

  escribir(buffer, offset, alumno) {
    buffer.fill(0, offset, offset + codecAlumno.tamano);
    buffer.writeInt32LE(alumno.grupoId, offset);
    buffer.writeInt32LE(alumno.matricula, offset + 4);
    escribirTexto(buffer, offset + OFFSET_NOMBRE, alumno.nombre, CAMPO_NOMBRE);

    const { np1, np2, pim, promedio } = alumno.calificaciones;
    [np1, np2, pim, promedio].forEach((nota, indice) => {
      buffer.writeDoubleLE(nota, offset + OFFSET_CALIFICACIONES + indice * 8);
    });

    const evaluaciones = alumno.evaluaciones.slice(0, MAX_EVALUACIONES);
    evaluaciones.forEach((evaluacion, indice) => {
      escribirEvaluacion(buffer, offset + OFFSET_EVALUACIONES + indice * TAMANO_EVALUACION, evaluacion);
    });

    const asistencias = alumno.asistencias.slice(0, MAX_ASISTENCIAS);
    asistencias.forEach((asistencia, indice) => {
      escribirAsistencia(buffer, offset + OFFSET_ASISTENCIAS + indice * TAMANO_ASISTENCIA, asistencia);
    });

    buffer.writeInt32LE(evaluaciones.length, offset + OFFSET_CONTADORES);
    buffer.writeInt32LE(asistencias.length, offset + OFFSET_CONTADORES + 4);
  },

  leer(buffer, offset) {
    const notas = [0, 1, 2, 3].map((indice) => buffer.readDoubleLE(offset + OFFSET_CALIFICACIONES + indice * 8));
    const numEvaluaciones = acotar(buffer.readInt32LE(offset + OFFSET_CONTADORES), MAX_EVALUACIONES);
    const numAsistencias = acotar(buffer.readInt32LE(offset + OFFSET_CONTADORES + 4), MAX_ASISTENCIAS);

    const evaluaciones: Evaluacion[] = [];
    for (let indice = 0; indice < numEvaluaciones; indice += 1) {
      evaluaciones.push(leerEvaluacion(buffer, offset + OFFSET_EVALUACIONES + indice * TAMANO_EVALUACION));
    }
    const asistencias: Asistencia[] = [];
    for (let indice = 0; indice < numAsistencias; indice += 1) {
      asistencias.push(leerAsistencia(buffer, offset + OFFSET_ASISTENCIAS + indice * TAMANO_ASISTENCIA));
    }

    return {
      grupoId: buffer.readInt32LE(offset),
      matricula: buffer.readInt32LE(offset + 4),
      nombre: leerTexto(buffer, offset + OFFSET_NOMBRE, CAMPO_NOMBRE),
      calificaciones: { np1: notas[0], np2: notas[1], pim: notas[2], promedio: notas[3] },
      evaluaciones,
      asistencias
    };
  }
};
