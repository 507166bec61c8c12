// Pruebas de carga perezosa, volcado y recuperacion de archivos.
import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlmacenAcademico } from '../src/almacenAcademico';
import { ErrorAplicacion } from '../src/compartido/errores/errorAplicacion';
import { codificarTabla } from '../src/infraestructura/archivos/codecBinario';
import { codecGrupo } from '../src/modulos/modulo_grupos/codecGrupo';
import {
  borrarDirectorio,
  crearAlmacen,
  crearDirectorioTemporal,
  crearRegistroEspia,
  rutasEn,
  type RegistroEspia
} from './utils/almacenTemporal';

function mensajes(registro: RegistroEspia, nivel: string) {
  return registro.log.mock.calls.filter(([nivelLlamada]) => nivelLlamada === nivel).map(([, mensaje]) => mensaje);
}

function codigosDeError(registro: RegistroEspia) {
  return registro.logError.mock.calls.map(([, error]) => (error instanceof ErrorAplicacion ? error.codigo : null));
}

describe('persistencia del almacen', () => {
  let directorio: string;

  beforeEach(() => {
    directorio = crearDirectorioTemporal();
  });

  afterEach(() => {
    borrarDirectorio(directorio);
  });

  it('carga de forma perezosa en la primera operacion', () => {
    const { almacen, registro } = crearAlmacen(directorio);

    expect(almacen.estaCargado).toBe(false);
    expect(registro.log).not.toHaveBeenCalled();

    expect(almacen.existeGrupo(1)).toBe(false);
    expect(almacen.estaCargado).toBe(true);
    expect(mensajes(registro, 'info')).toEqual([
      'Archivo no encontrado; se inicia vacio',
      'Archivo no encontrado; se inicia vacio'
    ]);
  });

  it('relee exactamente lo que escribio', () => {
    const { almacen } = crearAlmacen(directorio);
    almacen.guardarGrupo({ id: 1, nombreMateria: 'Algoritmos', nombreDocente: 'Dr. Smith' });
    almacen.guardarGrupo({ id: 2, nombreMateria: 'Redes', nombreDocente: 'Mtra. Luna' });
    almacen.guardarAlumno({
      grupoId: 1,
      matricula: 1001,
      nombre: 'Ana',
      calificaciones: { np1: 8.0, np2: 7.5, pim: 9.0, promedio: 8.17 }
    });
    almacen.agregarEvaluacion(1001, { puntaje: 9.25, comentario: 'Muy bien', fecha: '15/03/2024' });
    almacen.agregarAsistencia(1001, { fecha: '01/03/2024', presente: true });

    const antesGrupos = almacen.listarGrupos();
    const antesAlumno = almacen.buscarAlumno(1001);

    almacen.forzarRecarga();
    expect(almacen.listarGrupos()).toEqual(antesGrupos);
    expect(almacen.buscarAlumno(1001)).toEqual(antesAlumno);

    const otro = crearAlmacen(directorio).almacen;
    expect(otro.listarGrupos()).toEqual(antesGrupos);
    expect(otro.buscarAlumno(1001)).toEqual(antesAlumno);
  });

  it('informa solo_memoria si no puede escribir y reintenta con persistir', () => {
    const bloqueo = path.join(directorio, 'bloqueo');
    fs.writeFileSync(bloqueo, 'no soy carpeta');
    const registro = crearRegistroEspia();
    const almacen = new AlmacenAcademico({
      rutaGrupos: path.join(bloqueo, 'grupos.dat'),
      rutaAlumnos: path.join(bloqueo, 'alumnos.dat'),
      registro
    });

    expect(almacen.guardarGrupo({ id: 1, nombreMateria: 'Algoritmos', nombreDocente: 'Dr. Smith' })).toEqual({
      ok: true,
      persistencia: 'solo_memoria'
    });
    expect(almacen.existeGrupo(1)).toBe(true);
    expect(codigosDeError(registro)).toContain('PERSISTENCIA_ESCRITURA');

    fs.rmSync(bloqueo);
    expect(almacen.persistir()).toBe('durable');

    const releido = new AlmacenAcademico({
      rutaGrupos: path.join(bloqueo, 'grupos.dat'),
      rutaAlumnos: path.join(bloqueo, 'alumnos.dat'),
      registro: crearRegistroEspia()
    });
    expect(releido.buscarGrupo(1)).toEqual({ id: 1, nombreMateria: 'Algoritmos', nombreDocente: 'Dr. Smith' });
  });

  it('registra un error de lectura distinto de archivo ausente', () => {
    fs.mkdirSync(path.join(directorio, 'grupos.dat'));
    const { almacen, registro } = crearAlmacen(directorio);

    expect(almacen.listarGrupos()).toEqual([]);
    expect(codigosDeError(registro)).toEqual(['PERSISTENCIA_LECTURA']);
  });

  it('limpiarTodo deja archivos con conteo cero', () => {
    const { almacen } = crearAlmacen(directorio);
    almacen.guardarGrupo({ id: 1, nombreMateria: 'Algoritmos', nombreDocente: 'Dr. Smith' });
    almacen.guardarAlumno({ grupoId: 1, matricula: 1001, nombre: 'Ana' });

    expect(almacen.limpiarTodo()).toEqual({ ok: true, persistencia: 'durable' });
    expect(almacen.estaCargado).toBe(true);
    expect(almacen.listarGrupos()).toEqual([]);

    const { rutaGrupos, rutaAlumnos } = rutasEn(directorio);
    expect([...fs.readFileSync(rutaGrupos)]).toEqual([0, 0, 0, 0]);
    expect([...fs.readFileSync(rutaAlumnos)]).toEqual([0, 0, 0, 0]);
  });

  it('omite claves repetidas del archivo con advertencia', () => {
    const { rutaGrupos } = rutasEn(directorio);
    fs.writeFileSync(
      rutaGrupos,
      codificarTabla(codecGrupo, [
        { id: 1, nombreMateria: 'Primero', nombreDocente: 'A' },
        { id: 1, nombreMateria: 'Repetido', nombreDocente: 'B' },
        { id: 2, nombreMateria: 'Segundo', nombreDocente: 'C' }
      ])
    );
    const { almacen, registro } = crearAlmacen(directorio);

    expect(almacen.listarGrupos().map((grupo) => grupo.nombreMateria)).toEqual(['Primero', 'Segundo']);
    expect(registro.log).toHaveBeenCalledWith('warn', 'Registro omitido al cargar', {
      entidad: 'grupos',
      clave: 1,
      motivo: 'conflicto'
    });
  });

  it('carga hasta la capacidad cuando el archivo trae de mas', () => {
    const { rutaGrupos } = rutasEn(directorio);
    fs.writeFileSync(
      rutaGrupos,
      codificarTabla(
        codecGrupo,
        [1, 2, 3].map((id) => ({ id, nombreMateria: `M${id}`, nombreDocente: '' }))
      )
    );
    const { almacen, registro } = crearAlmacen(directorio, { maxGrupos: 2 });

    expect(almacen.listarGrupos().map((grupo) => grupo.id)).toEqual([1, 2]);
    expect(registro.log).toHaveBeenCalledWith('warn', 'Registro omitido al cargar', {
      entidad: 'grupos',
      clave: 3,
      motivo: 'capacidad_excedida'
    });
  });

  it('guarda en memoria el mismo texto que relee del archivo', () => {
    const { almacen } = crearAlmacen(directorio);

    expect(almacen.guardarGrupo({ id: 1, nombreMateria: 'Algo\uD83D', nombreDocente: 'Dr. Smith' })).toEqual({
      ok: true,
      persistencia: 'durable'
    });
    almacen.guardarAlumno({ grupoId: 1, matricula: 1001, nombre: '\uDC00Ana' });
    const antesGrupo = almacen.buscarGrupo(1);
    const antesAlumno = almacen.buscarAlumno(1001);
    expect(antesGrupo?.nombreMateria).toBe('Algo\uFFFD');
    expect(antesAlumno?.nombre).toBe('\uFFFDAna');

    almacen.forzarRecarga();
    expect(almacen.buscarGrupo(1)).toEqual(antesGrupo);
    expect(almacen.buscarAlumno(1001)).toEqual(antesAlumno);
  });

  it('ve cambios externos solo tras forzarRecarga', () => {
    const primero = crearAlmacen(directorio).almacen;
    const segundo = crearAlmacen(directorio).almacen;
    expect(segundo.listarGrupos()).toEqual([]);

    primero.guardarGrupo({ id: 5, nombreMateria: 'Bases de datos', nombreDocente: 'Ing. Mora' });
    expect(segundo.existeGrupo(5)).toBe(false);

    segundo.forzarRecarga();
    expect(segundo.existeGrupo(5)).toBe(true);
  });

  it('resume tablas con capacidad y presencia de archivo', () => {
    const { almacen } = crearAlmacen(directorio, { maxGrupos: 3 });
    almacen.guardarGrupo({ id: 1, nombreMateria: 'Algoritmos', nombreDocente: 'Dr. Smith' });

    const { rutaGrupos, rutaAlumnos } = rutasEn(directorio);
    expect(almacen.resumenTablas()).toEqual({
      grupos: { total: 1, capacidad: 3, ruta: rutaGrupos, existeArchivo: true },
      alumnos: { total: 0, capacidad: 500, ruta: rutaAlumnos, existeArchivo: false }
    });
  });

  it('rechaza configuraciones invalidas al construir', () => {
    const rutas = rutasEn(directorio);

    expect(() => new AlmacenAcademico({ ...rutas, maxGrupos: 0 })).toThrow(ErrorAplicacion);
    expect(() => new AlmacenAcademico({ ...rutas, maxAlumnos: 2.5 })).toThrow(ErrorAplicacion);
    expect(() => new AlmacenAcademico({ ...rutas, rutaGrupos: '  ' })).toThrow('rutaGrupos es requerido');
  });
});
