/**
 * configuracion.test
 *
 * Responsabilidad: Verificar lectura de variables de entorno y valores por defecto.
 * Limites: Cada caso recarga el modulo con un entorno controlado.
 */
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parsearNumeroSeguro } from '../src/configuracion';

const VARIABLES = ['RUTA_DATOS', 'ARCHIVO_GRUPOS', 'ARCHIVO_ALUMNOS', 'MAX_GRUPOS', 'MAX_ALUMNOS'];

async function cargarConfiguracion() {
  vi.resetModules();
  const { configuracion } = await import('../src/configuracion');
  return configuracion;
}

describe('parsearNumeroSeguro', () => {
  it('usa el valor por defecto ante vacios o no numericos', () => {
    expect(parsearNumeroSeguro(undefined, 5)).toBe(5);
    expect(parsearNumeroSeguro('   ', 5)).toBe(5);
    expect(parsearNumeroSeguro('abc', 5)).toBe(5);
  });

  it('acota al rango indicado', () => {
    expect(parsearNumeroSeguro('250', 5, { min: 1, max: 100 })).toBe(100);
    expect(parsearNumeroSeguro('-3', 5, { min: 1 })).toBe(1);
    expect(parsearNumeroSeguro(42, 5)).toBe(42);
  });
});

describe('configuracion', () => {
  beforeEach(() => {
    for (const variable of VARIABLES) vi.stubEnv(variable, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('expone valores por defecto', async () => {
    const configuracion = await cargarConfiguracion();

    expect(configuracion).toMatchObject({
      rutaDatos: path.join(process.cwd(), 'data'),
      archivoGrupos: 'grupos.dat',
      archivoAlumnos: 'alumnos.dat',
      maxGrupos: 100,
      maxAlumnos: 500
    });
  });

  it('lee rutas y topes del entorno', async () => {
    vi.stubEnv('RUTA_DATOS', '/tmp/almacen');
    vi.stubEnv('ARCHIVO_GRUPOS', 'g.bin');
    vi.stubEnv('MAX_GRUPOS', '12.8');
    vi.stubEnv('MAX_ALUMNOS', '0');

    const configuracion = await cargarConfiguracion();

    expect(configuracion.rutaDatos).toBe(path.resolve('/tmp/almacen'));
    expect(configuracion.archivoGrupos).toBe('g.bin');
    expect(configuracion.maxGrupos).toBe(12);
    expect(configuracion.maxAlumnos).toBe(1);
  });
});
