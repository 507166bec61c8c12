/**
 * Superficie de codigos enteros sobre el almacen.
 *
 * Para capas (menus, puentes) que esperan el contrato clasico:
 * - `1`: exito.
 * - `0`: no encontrado, entrada invalida o capacidad agotada.
 * - `-1`: solo en cambios de clave, cuando la clave nueva ya existe.
 *
 * Las busquedas devuelven `{ codigo, valor }` y los listados `{ total, ... }`.
 * Un volcado fallido no cambia el codigo (el cambio quedo en memoria); quien
 * necesite distinguirlo usa `AlmacenAcademico` directamente.
 */
import type { AlmacenAcademico } from '../../almacenAcademico';
import { CategoriaFallo, type ResultadoEscritura } from '../../compartido/resultados/tiposResultado';
import type { Alumno, Asistencia, Calificaciones, Evaluacion } from '../modulo_alumnos/modeloAlumno';
import type { EntradaAlumno } from '../modulo_alumnos/validacionesAlumnos';
import type { Grupo } from '../modulo_grupos/modeloGrupo';

export type CodigoRetorno = 1 | 0 | -1;

export type Busqueda<T> = { codigo: 1; valor: T } | { codigo: 0; valor: null };

export type Listado<T> = { total: number; registros: T[] };

export function codigoEscritura(resultado: ResultadoEscritura, { conflictoNegativo = false } = {}): CodigoRetorno {
  if (resultado.ok) return 1;
  if (conflictoNegativo && resultado.motivo === CategoriaFallo.CONFLICTO) return -1;
  return 0;
}

function codigoBooleano(valor: boolean): CodigoRetorno {
  return valor ? 1 : 0;
}

function busqueda<T>(valor: T | null): Busqueda<T> {
  return valor === null ? { codigo: 0, valor: null } : { codigo: 1, valor };
}

function listado<T>(registros: T[]): Listado<T> {
  return { total: registros.length, registros };
}

export function crearApiCodigos(almacen: AlmacenAcademico) {
  return {
    // Grupos
    guardarGrupo: (grupo: Grupo) => codigoEscritura(almacen.guardarGrupo(grupo)),
    grupoExiste: (id: number) => codigoBooleano(almacen.existeGrupo(id)),
    listarGrupos: (maximo: number): Listado<Grupo> => listado(almacen.listarGrupos(maximo)),
    buscarGrupoPorId: (id: number): Busqueda<Grupo> => busqueda(almacen.buscarGrupo(id)),
    actualizarGrupo: (id: number, nombreMateria: string, nombreDocente: string) =>
      codigoEscritura(almacen.actualizarGrupo(id, nombreMateria, nombreDocente)),
    cambiarIdGrupo: (anterior: number, nuevo: number) =>
      codigoEscritura(almacen.cambiarIdGrupo(anterior, nuevo), { conflictoNegativo: true }),
    eliminarGrupo: (id: number) => codigoEscritura(almacen.eliminarGrupo(id)),

    // Alumnos
    guardarAlumno: (alumno: EntradaAlumno) => codigoEscritura(almacen.guardarAlumno(alumno)),
    matriculaExiste: (matricula: number) => codigoBooleano(almacen.existeAlumno(matricula)),
    listarAlumnosPorGrupo: (grupoId: number, maximo: number): Listado<Alumno> =>
      listado(almacen.listarAlumnosPorGrupo(grupoId, maximo)),
    buscarAlumnoPorMatricula: (matricula: number): Busqueda<Alumno> => busqueda(almacen.buscarAlumno(matricula)),
    actualizarAlumno: (matricula: number, nombre: string) =>
      codigoEscritura(almacen.actualizarNombreAlumno(matricula, nombre)),
    cambiarMatricula: (anterior: number, nueva: number) =>
      codigoEscritura(almacen.cambiarMatricula(anterior, nueva), { conflictoNegativo: true }),
    eliminarAlumno: (matricula: number) => codigoEscritura(almacen.eliminarAlumno(matricula)),

    // Calificaciones
    guardarCalificaciones: (matricula: number, calificaciones: Calificaciones) =>
      codigoEscritura(almacen.guardarCalificaciones(matricula, calificaciones)),
    buscarCalificaciones: (matricula: number): Busqueda<Calificaciones> =>
      busqueda(almacen.buscarCalificaciones(matricula)),

    // Asistencias
    agregarAsistencia: (matricula: number, asistencia: Asistencia) =>
      codigoEscritura(almacen.agregarAsistencia(matricula, asistencia)),
    listarAsistencias: (matricula: number, maximo: number): Listado<Asistencia> =>
      listado(almacen.listarAsistencias(matricula, maximo)),
    buscarAsistenciaPorFecha: (matricula: number, fecha: string): Busqueda<Asistencia> =>
      busqueda(almacen.buscarAsistenciaPorFecha(matricula, fecha)),

    // Evaluaciones
    agregarEvaluacion: (matricula: number, evaluacion: Evaluacion) =>
      codigoEscritura(almacen.agregarEvaluacion(matricula, evaluacion)),
    listarEvaluaciones: (matricula: number, maximo: number): Listado<Evaluacion> =>
      listado(almacen.listarEvaluaciones(matricula, maximo)),
    actualizarEvaluacion: (matricula: number, fecha: string, nueva: Evaluacion) =>
      codigoEscritura(almacen.actualizarEvaluacionPorFecha(matricula, fecha, nueva)),

    // Mantenimiento
    forzarRecarga: () => almacen.forzarRecarga(),
    limpiarBancoCompleto: () => codigoEscritura(almacen.limpiarTodo())
  };
}

export type ApiCodigos = ReturnType<typeof crearApiCodigos>;
