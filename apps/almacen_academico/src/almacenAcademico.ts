/**
 * Almacen academico: fachada sobre las tablas de grupos y alumnos.
 *
 * Contrato:
 * - Cada operacion publica asegura la carga (una sola lectura por instancia),
 *   valida su entrada, muta la memoria y, si tuvo exito, vuelca de inmediato
 *   los archivos afectados antes de regresar.
 * - Cambiar el id de un grupo o eliminarlo arrastra a sus alumnos y vuelca
 *   ambos archivos.
 * - Nada lanza: los fallos vuelven como `{ ok: false, motivo }`. Un volcado
 *   fallido no revierte la memoria; se informa como `persistencia: 'solo_memoria'`.
 * - E/S sincrona: una operacion corre completa sin ceder el event loop, por lo
 *   que dentro de un proceso no hace falta exclusion mutua. Dos procesos sobre
 *   los mismos archivos no estan soportados.
 */
import { ErrorAplicacion } from './compartido/errores/errorAplicacion';
import {
  CategoriaFallo,
  estadoPersistencia,
  fallo,
  type EstadoPersistencia,
  type Resultado,
  type ResultadoEscritura
} from './compartido/resultados/tiposResultado';
import { validarEntrada } from './compartido/validaciones/validar';
import { GestorPersistencia } from './infraestructura/archivos/gestorPersistencia';
import { registroConsola, type Registrador } from './infraestructura/logging/logger';
import type { Alumno, Asistencia, Calificaciones, Evaluacion } from './modulos/modulo_alumnos/modeloAlumno';
import { TablaAlumnos } from './modulos/modulo_alumnos/tablaAlumnos';
import {
  esquemaAlumno,
  esquemaAsistencia,
  esquemaCalificaciones,
  esquemaCambioMatricula,
  esquemaEvaluacion,
  esquemaNombreAlumno,
  type EntradaAlumno
} from './modulos/modulo_alumnos/validacionesAlumnos';
import type { Grupo } from './modulos/modulo_grupos/modeloGrupo';
import { TablaGrupos } from './modulos/modulo_grupos/tablaGrupos';
import { esquemaCambioIdGrupo, esquemaGrupo } from './modulos/modulo_grupos/validacionesGrupos';

export const MAX_GRUPOS_POR_DEFECTO = 100;
export const MAX_ALUMNOS_POR_DEFECTO = 500;

export interface OpcionesAlmacen {
  rutaGrupos: string;
  rutaAlumnos: string;
  maxGrupos?: number;
  maxAlumnos?: number;
  registro?: Registrador;
}

type Archivo = 'grupos' | 'alumnos';

export type ResumenTabla = {
  total: number;
  capacidad: number;
  ruta: string;
  existeArchivo: boolean;
};

function validarCapacidad(nombre: string, valor: number) {
  if (!Number.isInteger(valor) || valor < 1) {
    throw new ErrorAplicacion('CONFIGURACION_INVALIDA', `${nombre} debe ser un entero positivo`, { [nombre]: valor });
  }
  return valor;
}

function validarRuta(nombre: string, valor: string) {
  if (typeof valor !== 'string' || !valor.trim()) {
    throw new ErrorAplicacion('CONFIGURACION_INVALIDA', `${nombre} es requerido`);
  }
  return valor;
}

export class AlmacenAcademico {
  private readonly grupos: TablaGrupos;
  private readonly alumnos: TablaAlumnos;
  private readonly persistencia: GestorPersistencia;
  private readonly registro: Registrador;

  constructor(opciones: OpcionesAlmacen) {
    this.registro = opciones.registro ?? registroConsola;
    this.grupos = new TablaGrupos(validarCapacidad('maxGrupos', opciones.maxGrupos ?? MAX_GRUPOS_POR_DEFECTO));
    this.alumnos = new TablaAlumnos(validarCapacidad('maxAlumnos', opciones.maxAlumnos ?? MAX_ALUMNOS_POR_DEFECTO));
    this.persistencia = new GestorPersistencia(
      { grupos: this.grupos, alumnos: this.alumnos },
      {
        rutaGrupos: validarRuta('rutaGrupos', opciones.rutaGrupos),
        rutaAlumnos: validarRuta('rutaAlumnos', opciones.rutaAlumnos)
      },
      this.registro
    );
  }

  // ==========================================================================
  // Ciclo de vida
  // ==========================================================================

  get estaCargado() {
    return this.persistencia.estaCargado;
  }

  asegurarCargado() {
    this.persistencia.asegurarCargado();
  }

  /** Descarta la memoria y relee ambos archivos (cambios externos). */
  forzarRecarga() {
    this.persistencia.forzarRecarga();
    this.registro.log('ok', 'Recarga completa', { grupos: this.grupos.total, alumnos: this.alumnos.total });
  }

  /** Vacia ambas tablas y escribe los archivos vacios. */
  limpiarTodo(): ResultadoEscritura {
    const [grupos, alumnos] = this.persistencia.limpiarTodo();
    return { ok: true, persistencia: estadoPersistencia(grupos, alumnos) };
  }

  /** Vuelca ambas tablas; sirve para reintentar tras un `solo_memoria`. */
  persistir(): EstadoPersistencia {
    this.asegurarCargado();
    return this.volcar('grupos', 'alumnos');
  }

  resumenTablas(): { grupos: ResumenTabla; alumnos: ResumenTabla } {
    this.asegurarCargado();
    const { archivoGrupos, archivoAlumnos } = this.persistencia;
    return {
      grupos: {
        total: this.grupos.total,
        capacidad: this.grupos.capacidad,
        ruta: archivoGrupos.ruta,
        existeArchivo: archivoGrupos.existe()
      },
      alumnos: {
        total: this.alumnos.total,
        capacidad: this.alumnos.capacidad,
        ruta: archivoAlumnos.ruta,
        existeArchivo: archivoAlumnos.existe()
      }
    };
  }

  // ==========================================================================
  // Grupos
  // ==========================================================================

  guardarGrupo(grupo: Grupo): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaGrupo, grupo, { operacion: 'guardarGrupo', registro: this.registro });
    if (!entrada.ok) return entrada;

    const resultado = this.grupos.insertar(entrada.valor);
    if (!resultado.ok) {
      this.registro.log('warn', 'Grupo no guardado', { id: entrada.valor.id, motivo: resultado.motivo });
      return resultado;
    }
    const persistencia = this.volcar('grupos');
    this.registro.log('ok', 'Grupo guardado', { id: entrada.valor.id, total: this.grupos.total });
    return { ok: true, persistencia };
  }

  existeGrupo(id: number) {
    this.asegurarCargado();
    return this.grupos.existe(id);
  }

  buscarGrupo(id: number): Grupo | null {
    this.asegurarCargado();
    return this.grupos.buscar(id);
  }

  listarGrupos(limite?: number): Grupo[] {
    this.asegurarCargado();
    return this.grupos.listar(limite);
  }

  actualizarGrupo(id: number, nombreMateria: string, nombreDocente: string): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(
      esquemaGrupo,
      { id, nombreMateria, nombreDocente },
      { operacion: 'actualizarGrupo', registro: this.registro }
    );
    if (!entrada.ok) return entrada;

    const resultado = this.grupos.actualizar(id, entrada.valor.nombreMateria, entrada.valor.nombreDocente);
    if (!resultado.ok) {
      this.registro.log('warn', 'Grupo no encontrado', { id });
      return resultado;
    }
    const persistencia = this.volcar('grupos');
    this.registro.log('ok', 'Grupo actualizado', { id });
    return { ok: true, persistencia };
  }

  /**
   * Cambia el id de un grupo y el `grupoId` de todos sus alumnos.
   * Mismo id: exito sin escribir. Id nuevo ocupado: `CONFLICTO`.
   */
  cambiarIdGrupo(anterior: number, nuevo: number): ResultadoEscritura<{ alumnosActualizados: number }> {
    this.asegurarCargado();
    const entrada = validarEntrada(
      esquemaCambioIdGrupo,
      { anterior, nuevo },
      { operacion: 'cambiarIdGrupo', registro: this.registro }
    );
    if (!entrada.ok) return entrada;
    if (anterior === nuevo) return { ok: true, persistencia: 'durable', alumnosActualizados: 0 };

    const resultado = this.grupos.cambiarId(anterior, nuevo);
    if (!resultado.ok) {
      this.registro.log('warn', 'Id de grupo no cambiado', { anterior, nuevo, motivo: resultado.motivo });
      return resultado;
    }
    const alumnosActualizados = this.alumnos.reasignarGrupo(anterior, nuevo);
    const persistencia = this.volcar('grupos', 'alumnos');
    this.registro.log('ok', 'Id de grupo cambiado', { anterior, nuevo, alumnosActualizados });
    return { ok: true, persistencia, alumnosActualizados };
  }

  /** Elimina el grupo y, en cascada, a todos sus alumnos. */
  eliminarGrupo(id: number): ResultadoEscritura<{ alumnosEliminados: number }> {
    this.asegurarCargado();
    if (!this.grupos.eliminar(id)) {
      this.registro.log('warn', 'Grupo no encontrado', { id });
      return fallo(CategoriaFallo.NO_ENCONTRADO);
    }
    const alumnosEliminados = this.alumnos.eliminarPorGrupo(id);
    const persistencia = this.volcar('alumnos', 'grupos');
    this.registro.log('ok', 'Grupo eliminado', { id, alumnosEliminados });
    return { ok: true, persistencia, alumnosEliminados };
  }

  // ==========================================================================
  // Alumnos
  // ==========================================================================

  /** Inserta un alumno. No verifica que `grupoId` exista. */
  guardarAlumno(alumno: EntradaAlumno): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaAlumno, alumno, { operacion: 'guardarAlumno', registro: this.registro });
    if (!entrada.ok) return entrada;

    const resultado = this.alumnos.insertar(entrada.valor);
    if (!resultado.ok) {
      this.registro.log('warn', 'Alumno no guardado', { matricula: entrada.valor.matricula, motivo: resultado.motivo });
      return resultado;
    }
    const persistencia = this.volcar('alumnos');
    this.registro.log('ok', 'Alumno guardado', { matricula: entrada.valor.matricula, total: this.alumnos.total });
    return { ok: true, persistencia };
  }

  existeAlumno(matricula: number) {
    this.asegurarCargado();
    return this.alumnos.existe(matricula);
  }

  buscarAlumno(matricula: number): Alumno | null {
    this.asegurarCargado();
    return this.alumnos.buscar(matricula);
  }

  listarAlumnosPorGrupo(grupoId: number, limite?: number): Alumno[] {
    this.asegurarCargado();
    return this.alumnos.listarPorGrupo(grupoId, limite);
  }

  actualizarNombreAlumno(matricula: number, nombre: string): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaNombreAlumno, nombre, {
      operacion: 'actualizarNombreAlumno',
      registro: this.registro
    });
    if (!entrada.ok) return entrada;
    return this.escribirAlumno(this.alumnos.actualizarNombre(matricula, entrada.valor), 'Nombre de alumno actualizado', {
      matricula
    });
  }

  cambiarMatricula(anterior: number, nueva: number): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(
      esquemaCambioMatricula,
      { anterior, nueva },
      { operacion: 'cambiarMatricula', registro: this.registro }
    );
    if (!entrada.ok) return entrada;
    if (anterior === nueva) return { ok: true, persistencia: 'durable' };
    return this.escribirAlumno(this.alumnos.cambiarMatricula(anterior, nueva), 'Matricula cambiada', {
      anterior,
      nueva
    });
  }

  eliminarAlumno(matricula: number): ResultadoEscritura {
    this.asegurarCargado();
    if (!this.alumnos.eliminar(matricula)) {
      this.registro.log('warn', 'Alumno no encontrado', { matricula });
      return fallo(CategoriaFallo.NO_ENCONTRADO);
    }
    const persistencia = this.volcar('alumnos');
    this.registro.log('ok', 'Alumno eliminado', { matricula });
    return { ok: true, persistencia };
  }

  // --- Calificaciones ---

  /** Reemplaza las calificaciones completas; no hay actualizacion parcial. */
  guardarCalificaciones(matricula: number, calificaciones: Calificaciones): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaCalificaciones, calificaciones, {
      operacion: 'guardarCalificaciones',
      registro: this.registro
    });
    if (!entrada.ok) return entrada;
    return this.escribirAlumno(
      this.alumnos.reemplazarCalificaciones(matricula, entrada.valor),
      'Calificaciones guardadas',
      { matricula, ...entrada.valor }
    );
  }

  buscarCalificaciones(matricula: number): Calificaciones | null {
    this.asegurarCargado();
    return this.alumnos.buscarCalificaciones(matricula);
  }

  // --- Asistencias ---

  agregarAsistencia(matricula: number, asistencia: Asistencia): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaAsistencia, asistencia, {
      operacion: 'agregarAsistencia',
      registro: this.registro
    });
    if (!entrada.ok) return entrada;
    return this.escribirAlumno(this.alumnos.agregarAsistencia(matricula, entrada.valor), 'Asistencia agregada', {
      matricula,
      fecha: entrada.valor.fecha,
      presente: entrada.valor.presente
    });
  }

  listarAsistencias(matricula: number, limite?: number): Asistencia[] {
    this.asegurarCargado();
    return this.alumnos.listarAsistencias(matricula, limite);
  }

  buscarAsistenciaPorFecha(matricula: number, fecha: string): Asistencia | null {
    this.asegurarCargado();
    return this.alumnos.buscarAsistenciaPorFecha(matricula, fecha);
  }

  // --- Evaluaciones ---

  agregarEvaluacion(matricula: number, evaluacion: Evaluacion): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaEvaluacion, evaluacion, {
      operacion: 'agregarEvaluacion',
      registro: this.registro
    });
    if (!entrada.ok) return entrada;
    return this.escribirAlumno(this.alumnos.agregarEvaluacion(matricula, entrada.valor), 'Evaluacion agregada', {
      matricula,
      fecha: entrada.valor.fecha,
      puntaje: entrada.valor.puntaje
    });
  }

  listarEvaluaciones(matricula: number, limite?: number): Evaluacion[] {
    this.asegurarCargado();
    return this.alumnos.listarEvaluaciones(matricula, limite);
  }

  /** Reemplaza la primera evaluacion con esa fecha. */
  actualizarEvaluacionPorFecha(matricula: number, fecha: string, nueva: Evaluacion): ResultadoEscritura {
    this.asegurarCargado();
    const entrada = validarEntrada(esquemaEvaluacion, nueva, {
      operacion: 'actualizarEvaluacionPorFecha',
      registro: this.registro
    });
    if (!entrada.ok) return entrada;
    return this.escribirAlumno(
      this.alumnos.actualizarEvaluacionPorFecha(matricula, fecha, entrada.valor),
      'Evaluacion actualizada',
      { matricula, fecha }
    );
  }

  // ==========================================================================
  // Internos
  // ==========================================================================

  private escribirAlumno(
    resultado: Resultado<unknown>,
    mensaje: string,
    meta: Record<string, unknown>
  ): ResultadoEscritura {
    if (!resultado.ok) {
      this.registro.log('warn', `${mensaje}: operacion rechazada`, { ...meta, motivo: resultado.motivo });
      return resultado;
    }
    const persistencia = this.volcar('alumnos');
    this.registro.log('ok', mensaje, meta);
    return { ok: true, persistencia };
  }

  private volcar(...archivos: Archivo[]): EstadoPersistencia {
    const escrituras = archivos.map((archivo) =>
      archivo === 'grupos' ? this.persistencia.guardarGrupos() : this.persistencia.guardarAlumnos()
    );
    return estadoPersistencia(...escrituras);
  }
}
