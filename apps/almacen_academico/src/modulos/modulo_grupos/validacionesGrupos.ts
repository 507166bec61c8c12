/**
 * Validaciones de grupos.
 */
import { z } from 'zod';
import { esquemaClaveEntera, esquemaTextoFijo } from '../../compartido/validaciones/esquemas';
import { MAX_BYTES_NOMBRE_DOCENTE, MAX_BYTES_NOMBRE_MATERIA } from './modeloGrupo';

export const esquemaIdGrupo = esquemaClaveEntera;

export const esquemaGrupo = z
  .object({
    id: esquemaIdGrupo,
    nombreMateria: esquemaTextoFijo(MAX_BYTES_NOMBRE_MATERIA),
    nombreDocente: esquemaTextoFijo(MAX_BYTES_NOMBRE_DOCENTE)
  })
  .strict();

export const esquemaCambioIdGrupo = z.object({
  anterior: esquemaIdGrupo,
  nuevo: esquemaIdGrupo
});
