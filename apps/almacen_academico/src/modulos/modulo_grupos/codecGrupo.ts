/**
 * Layout binario de Grupo (204 bytes).
 *
 *   0  int32     id
 *   4  char[100] nombreMateria
 * 104  char[100] nombreDocente
 */
import { leerTexto, escribirTexto, type CodecRegistro } from '../../infraestructura/archivos/codecBinario';
import { MAX_BYTES_NOMBRE_DOCENTE, MAX_BYTES_NOMBRE_MATERIA, type Grupo } from './modeloGrupo';

const CAMPO_MATERIA = MAX_BYTES_NOMBRE_MATERIA + 1;
const CAMPO_DOCENTE = MAX_BYTES_NOMBRE_DOCENTE + 1;

const OFFSET_MATERIA = 4;
const OFFSET_DOCENTE = OFFSET_MATERIA + CAMPO_MATERIA;

export const codecGrupo: CodecRegistro<Grupo> = {
  tamano: OFFSET_DOCENTE + CAMPO_DOCENTE,

  escribir(buffer, offset, grupo) {
    buffer.writeInt32LE(grupo.id, offset);
    escribirTexto(buffer, offset + OFFSET_MATERIA, grupo.nombreMateria, CAMPO_MATERIA);
    escribirTexto(buffer, offset + OFFSET_DOCENTE, grupo.nombreDocente, CAMPO_DOCENTE);
  },

  leer(buffer, offset) {
    return {
      id: buffer.readInt32LE(offset),
      nombreMateria: leerTexto(buffer, offset + OFFSET_MATERIA, CAMPO_MATERIA),
      nombreDocente: leerTexto(buffer, offset + OFFSET_DOCENTE, CAMPO_DOCENTE)
    };
  }
};
