/**
 * Modelo Grupo (seccion de una materia).
 */

// Bytes utiles de cada texto; el archivo reserva uno mas para el NUL final.
export const MAX_BYTES_NOMBRE_MATERIA = 99;
export const MAX_BYTES_NOMBRE_DOCENTE = 99;

export interface Grupo {
  id: number;
  nombreMateria: string;
  nombreDocente: string;
}

export function clonarGrupo(grupo: Grupo): Grupo {
  return { ...grupo };
}
