/**
 * Codec binario de tablas de registros de tamano fijo.
 *
 * Formato de archivo (little-endian):
 * - `int32` con el numero de registros.
 * - Los registros uno tras otro, todos de `codec.tamano` bytes, sin
 *   separadores, checksum ni version.
 *
 * Los textos ocupan un campo de `tamanoCampo` bytes: UTF-8 terminado y
 * rellenado con NUL, por lo que caben `tamanoCampo - 1` bytes utiles.
 */
import { truncarBytes } from '../../compartido/utilidades/texto';

export const TAMANO_ENCABEZADO = 4;

export interface CodecRegistro<T> {
  readonly tamano: number;
  escribir(buffer: Buffer, offset: number, valor: T): void;
  leer(buffer: Buffer, offset: number): T;
}

export function escribirTexto(buffer: Buffer, offset: number, valor: string, tamanoCampo: number) {
  buffer.fill(0, offset, offset + tamanoCampo);
  buffer.write(truncarBytes(valor, tamanoCampo - 1), offset, tamanoCampo - 1, 'utf8');
}

export function leerTexto(buffer: Buffer, offset: number, tamanoCampo: number): string {
  const campo = buffer.subarray(offset, offset + tamanoCampo);
  const fin = campo.indexOf(0);
  return campo.toString('utf8', 0, fin >= 0 ? fin : tamanoCampo);
}

export function codificarTabla<T>(codec: CodecRegistro<T>, registros: readonly T[]): Buffer {
  const buffer = Buffer.alloc(TAMANO_ENCABEZADO + registros.length * codec.tamano);
  buffer.writeInt32LE(registros.length, 0);
  registros.forEach((registro, indice) => {
    codec.escribir(buffer, TAMANO_ENCABEZADO + indice * codec.tamano, registro);
  });
  return buffer;
}

export type TablaDecodificada<T> = {
  registros: T[];
  // Conteo del encabezado; puede diferir de `registros.length` si el archivo esta truncado.
  declarados: number;
};

/**
 * Lee tantos registros completos como declare el encabezado y existan en el
 * buffer. Un buffer sin encabezado completo o con conteo negativo se trata
 * como tabla vacia.
 */
export function decodificarTabla<T>(codec: CodecRegistro<T>, buffer: Buffer): TablaDecodificada<T> {
  if (buffer.length < TAMANO_ENCABEZADO) return { registros: [], declarados: 0 };
  const declarados = buffer.readInt32LE(0);
  const disponibles = Math.floor((buffer.length - TAMANO_ENCABEZADO) / codec.tamano);
  const total = Math.max(0, Math.min(declarados, disponibles));

  const registros: T[] = [];
  for (let indice = 0; indice < total; indice += 1) {
    registros.push(codec.leer(buffer, TAMANO_ENCABEZADO + indice * codec.tamano));
  }
  return { registros, declarados };
}
