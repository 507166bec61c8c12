// Pruebas del logger JSON.
import { describe, expect, it, vi } from 'vitest';
import { ErrorAplicacion } from '../src/compartido/errores/errorAplicacion';
import { log, logError } from '../src/infraestructura/logging/logger';

function ultimaLinea(espia: { mock: { calls: unknown[][] } }) {
  const llamada = espia.mock.calls.at(-1);
  return JSON.parse(String(llamada?.[0]));
}

describe('logger', () => {
  it('emite una linea JSON por evento con nivel estandar', () => {
    const consola = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    log('ok', 'Registros guardados', { entidad: 'grupos', total: 3 });

    expect(ultimaLinea(consola)).toMatchObject({
      service: 'almacen-academico',
      level: 'info',
      message: 'Registros guardados',
      entidad: 'grupos',
      total: 3
    });
  });

  it('envia advertencias a console.warn', () => {
    const consola = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    log('warn', 'Registro omitido al cargar', { clave: 1 });

    expect(ultimaLinea(consola)).toMatchObject({ level: 'warn', clave: 1 });
  });

  it('serializa codigo y detalles de ErrorAplicacion', () => {
    const consola = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logError('Fallo de escritura', new ErrorAplicacion('PERSISTENCIA_ESCRITURA', 'sin acceso', { ruta: '/x' }), {
      entidad: 'alumnos'
    });

    expect(ultimaLinea(consola)).toMatchObject({
      level: 'error',
      message: 'Fallo de escritura',
      entidad: 'alumnos',
      error: {
        name: 'ErrorAplicacion',
        message: 'sin acceso',
        codigo: 'PERSISTENCIA_ESCRITURA',
        detalles: { ruta: '/x' }
      }
    });
  });
});
