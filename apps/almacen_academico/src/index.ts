/**
 * Punto de entrada del paquete: almacen, tipos y servicios auxiliares.
 */
import path from 'node:path';
import { AlmacenAcademico, type OpcionesAlmacen } from './almacenAcademico';
import { configuracion } from './configuracion';

export { AlmacenAcademico, MAX_ALUMNOS_POR_DEFECTO, MAX_GRUPOS_POR_DEFECTO } from './almacenAcademico';
export type { OpcionesAlmacen, ResumenTabla } from './almacenAcademico';
export { configuracion } from './configuracion';
export { ErrorAplicacion } from './compartido/errores/errorAplicacion';
export { CategoriaFallo } from './compartido/resultados/tiposResultado';
export type { EstadoPersistencia, ResultadoEscritura } from './compartido/resultados/tiposResultado';
export { log, logError, registroConsola } from './infraestructura/logging/logger';
export type { NivelLog, Registrador } from './infraestructura/logging/logger';
export { MAX_ASISTENCIAS, MAX_EVALUACIONES } from './modulos/modulo_alumnos/modeloAlumno';
export type { Alumno, Asistencia, Calificaciones, Evaluacion } from './modulos/modulo_alumnos/modeloAlumno';
export type { EntradaAlumno } from './modulos/modulo_alumnos/validacionesAlumnos';
export type { Grupo } from './modulos/modulo_grupos/modeloGrupo';
export {
  actualizarNotas,
  armarCalificaciones,
  calcularPromedio
} from './modulos/modulo_calificaciones/servicioCalificaciones';
export type { NotasParciales } from './modulos/modulo_calificaciones/servicioCalificaciones';
export { obtenerEstadisticas, reportarEstadisticas } from './modulos/modulo_estadisticas/servicioEstadisticas';
export type { EstadisticaTabla, EstadisticasAlmacen } from './modulos/modulo_estadisticas/servicioEstadisticas';
export { codigoEscritura, crearApiCodigos } from './modulos/modulo_codigos/apiCodigos';
export type { ApiCodigos, Busqueda, CodigoRetorno, Listado } from './modulos/modulo_codigos/apiCodigos';

/**
 * Construye un almacen con rutas y topes de `configuracion`.
 * `extra` permite sustituir cualquiera de ellos (p. ej. el registrador).
 */
export function crearAlmacenDesdeConfiguracion(extra: Partial<OpcionesAlmacen> = {}) {
  return new AlmacenAcademico({
    rutaGrupos: path.join(configuracion.rutaDatos, configuracion.archivoGrupos),
    rutaAlumnos: path.join(configuracion.rutaDatos, configuracion.archivoAlumnos),
    maxGrupos: configuracion.maxGrupos,
    maxAlumnos: configuracion.maxAlumnos,
    ...extra
  });
}
