/**
 * Configuracion centralizada del almacen.
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

export function parsearNumeroSeguro(
  valor: unknown,
  porDefecto: number,
  { min, max }: { min?: number; max?: number } = {}
) {
  if (valor === undefined || valor === null || String(valor).trim() === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

const entorno = process.env.NODE_ENV ?? 'development';
const rutaDatos = path.resolve(String(process.env.RUTA_DATOS ?? '').trim() || path.join(process.cwd(), 'data'));
const archivoGrupos = String(process.env.ARCHIVO_GRUPOS ?? '').trim() || 'grupos.dat';
const archivoAlumnos = String(process.env.ARCHIVO_ALUMNOS ?? '').trim() || 'alumnos.dat';

// Topes de las tablas. Las sub-colecciones de cada alumno (10 evaluaciones,
// 50 asistencias) son parte del formato del archivo y no se configuran.
const maxGrupos = Math.floor(parsearNumeroSeguro(process.env.MAX_GRUPOS, 100, { min: 1, max: 100_000 }));
const maxAlumnos = Math.floor(parsearNumeroSeguro(process.env.MAX_ALUMNOS, 500, { min: 1, max: 100_000 }));

export const configuracion = {
  entorno,
  rutaDatos,
  archivoGrupos,
  archivoAlumnos,
  maxGrupos,
  maxAlumnos
};
