/**
 * Repositorio de una tabla en un archivo binario local.
 *
 * Contrato:
 * - `leer` devuelve los registros del archivo; nunca lanza. Archivo ausente:
 *   tabla vacia. Otro error de lectura: se registra y la tabla queda vacia.
 * - `escribir` sobrescribe el archivo completo (crea la carpeta si falta) y
 *   devuelve `false` si no pudo; el error se registra, no se propaga.
 * - E/S sincrona: ninguna operacion cede el event loop a medias.
 */
import fs from 'node:fs';
import path from 'node:path';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Registrador } from '../logging/logger';
import { codificarTabla, decodificarTabla, type CodecRegistro } from './codecBinario';

function esArchivoInexistente(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describirCausa(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export class RepositorioBinario<T> {
  constructor(
    readonly ruta: string,
    private readonly codec: CodecRegistro<T>,
    private readonly entidad: string,
    private readonly registro: Registrador
  ) {}

  existe(): boolean {
    return fs.existsSync(this.ruta);
  }

  leer(): T[] {
    let contenido: Buffer;
    try {
      contenido = fs.readFileSync(this.ruta);
    } catch (error) {
      if (esArchivoInexistente(error)) {
        this.registro.log('info', 'Archivo no encontrado; se inicia vacio', { entidad: this.entidad, ruta: this.ruta });
      } else {
        this.registro.logError(
          'No se pudo leer el archivo; se inicia vacio',
          new ErrorAplicacion('PERSISTENCIA_LECTURA', `No se pudo leer ${this.ruta}`, {
            ruta: this.ruta,
            causa: describirCausa(error)
          }),
          { entidad: this.entidad }
        );
      }
      return [];
    }

    const { registros, declarados } = decodificarTabla(this.codec, contenido);
    if (registros.length !== declarados) {
      this.registro.log('warn', 'Archivo incompleto; se cargan solo los registros integros', {
        entidad: this.entidad,
        ruta: this.ruta,
        declarados,
        leidos: registros.length
      });
    }
    this.registro.log('info', 'Registros cargados', { entidad: this.entidad, ruta: this.ruta, total: registros.length });
    return registros;
  }

  escribir(registros: readonly T[]): boolean {
    try {
      fs.mkdirSync(path.dirname(this.ruta), { recursive: true });
      fs.writeFileSync(this.ruta, codificarTabla(this.codec, registros));
    } catch (error) {
      this.registro.logError(
        'No se pudo escribir el archivo; los cambios quedan solo en memoria',
        new ErrorAplicacion('PERSISTENCIA_ESCRITURA', `No se pudo abrir ${this.ruta} para escritura`, {
          ruta: this.ruta,
          causa: describirCausa(error)
        }),
        { entidad: this.entidad, total: registros.length }
      );
      return false;
    }
    this.registro.log('ok', 'Registros guardados', { entidad: this.entidad, ruta: this.ruta, total: registros.length });
    return true;
  }
}
