/**
 * Tabla de alumnos en memoria.
 *
 * Contrato:
 * - `matricula` unica; orden de insercion conservado.
 * - Cada alumno es dueno de sus evaluaciones (max 10) y asistencias (max 50).
 * - Las busquedas por fecha usan igualdad exacta y toman la primera coincidencia.
 * - `grupoId` es una referencia blanda: la tabla no la valida.
 */
import { normalizarLimite, TablaIndexada } from '../../compartido/colecciones/tablaIndexada';
import { CategoriaFallo, fallo, type RechazoCarga, type Resultado } from '../../compartido/resultados/tiposResultado';
import {
  MAX_ASISTENCIAS,
  MAX_EVALUACIONES,
  clonarAlumno,
  type Alumno,
  type Asistencia,
  type Calificaciones,
  type Evaluacion
} from './modeloAlumno';

export class TablaAlumnos {
  private readonly tabla: TablaIndexada<number, Alumno>;

  constructor(capacidad: number) {
    this.tabla = new TablaIndexada(capacidad, (alumno: Alumno) => alumno.matricula);
  }

  get total() {
    return this.tabla.total;
  }

  get capacidad() {
    return this.tabla.capacidad;
  }

  insertar(alumno: Alumno): Resultado<Alumno> {
    return this.tabla.insertar(clonarAlumno(alumno));
  }

  existe(matricula: number) {
    return this.tabla.tiene(matricula);
  }

  buscar(matricula: number): Alumno | null {
    const alumno = this.tabla.obtener(matricula);
    return alumno ? clonarAlumno(alumno) : null;
  }

  listarPorGrupo(grupoId: number, limite?: number): Alumno[] {
    return this.tabla.filtrar((alumno) => alumno.grupoId === grupoId, limite).map(clonarAlumno);
  }

  actualizarNombre(matricula: number, nombre: string): Resultado<Alumno> {
    return this.tabla.modificar(matricula, (actual) => ({ ...actual, nombre }));
  }

  cambiarMatricula(anterior: number, nueva: number) {
    return this.tabla.cambiarClave(anterior, nueva, (actual, matricula) => ({ ...actual, matricula }));
  }

  eliminar(matricula: number) {
    return this.tabla.eliminar(matricula);
  }

  /** Reasigna a `nuevo` los alumnos de `anterior`; devuelve cuantos cambiaron. */
  reasignarGrupo(anterior: number, nuevo: number) {
    return this.tabla.modificarDonde(
      (alumno) => alumno.grupoId === anterior,
      (actual) => ({ ...actual, grupoId: nuevo })
    );
  }

  eliminarPorGrupo(grupoId: number) {
    return this.tabla.eliminarDonde((alumno) => alumno.grupoId === grupoId);
  }

  // --- Calificaciones ---

  reemplazarCalificaciones(matricula: number, calificaciones: Calificaciones): Resultado<Alumno> {
    return this.tabla.modificar(matricula, (actual) => ({ ...actual, calificaciones: { ...calificaciones } }));
  }

  buscarCalificaciones(matricula: number): Calificaciones | null {
    const alumno = this.tabla.obtener(matricula);
    return alumno ? { ...alumno.calificaciones } : null;
  }

  // --- Asistencias ---

  agregarAsistencia(matricula: number, asistencia: Asistencia): Resultado<Alumno> {
    const actual = this.tabla.obtener(matricula);
    if (!actual) return fallo(CategoriaFallo.NO_ENCONTRADO);
    if (actual.asistencias.length >= MAX_ASISTENCIAS) return fallo(CategoriaFallo.CAPACIDAD_EXCEDIDA);
    return this.tabla.modificar(matricula, (alumno) => ({
      ...alumno,
      asistencias: [...alumno.asistencias, { ...asistencia }]
    }));
  }

  listarAsistencias(matricula: number, limite = Number.POSITIVE_INFINITY): Asistencia[] {
    const alumno = this.tabla.obtener(matricula);
    const maximo = normalizarLimite(limite);
    if (!alumno || maximo === 0) return [];
    return alumno.asistencias.slice(0, maximo).map((asistencia) => ({ ...asistencia }));
  }

  buscarAsistenciaPorFecha(matricula: number, fecha: string): Asistencia | null {
    const asistencia = this.tabla.obtener(matricula)?.asistencias.find((item) => item.fecha === fecha);
    return asistencia ? { ...asistencia } : null;
  }

  // --- Evaluaciones ---

  agregarEvaluacion(matricula: number, evaluacion: Evaluacion): Resultado<Alumno> {
    const actual = this.tabla.obtener(matricula);
    if (!actual) return fallo(CategoriaFallo.NO_ENCONTRADO);
    if (actual.evaluaciones.length >= MAX_EVALUACIONES) return fallo(CategoriaFallo.CAPACIDAD_EXCEDIDA);
    return this.tabla.modificar(matricula, (alumno) => ({
      ...alumno,
      evaluaciones: [...alumno.evaluaciones, { ...evaluacion }]
    }));
  }

  listarEvaluaciones(matricula: number, limite = Number.POSITIVE_INFINITY): Evaluacion[] {
    const alumno = this.tabla.obtener(matricula);
    const maximo = normalizarLimite(limite);
    if (!alumno || maximo === 0) return [];
    return alumno.evaluaciones.slice(0, maximo).map((evaluacion) => ({ ...evaluacion }));
  }

  /** Reemplaza la primera evaluacion con `fecha`; la nueva puede traer otra fecha. */
  actualizarEvaluacionPorFecha(matricula: number, fecha: string, nueva: Evaluacion): Resultado<Alumno> {
    const actual = this.tabla.obtener(matricula);
    if (!actual) return fallo(CategoriaFallo.NO_ENCONTRADO);
    const indice = actual.evaluaciones.findIndex((evaluacion) => evaluacion.fecha === fecha);
    if (indice < 0) return fallo(CategoriaFallo.NO_ENCONTRADO);
    const evaluaciones = actual.evaluaciones.map((evaluacion, posicion) =>
      posicion === indice ? { ...nueva } : evaluacion
    );
    return this.tabla.modificar(matricula, (alumno) => ({ ...alumno, evaluaciones }));
  }

  registros(): readonly Alumno[] {
    return this.tabla.valores();
  }

  vaciar() {
    this.tabla.vaciar();
  }

  cargar(alumnos: readonly Alumno[]): RechazoCarga[] {
    const rechazos: RechazoCarga[] = [];
    for (const alumno of alumnos) {
      const resultado = this.tabla.insertar(alumno);
      if (!resultado.ok) rechazos.push({ clave: alumno.matricula, motivo: resultado.motivo });
    }
    return rechazos;
  }
}
