/**
 * Utilidades de texto para campos de longitud fija.
 */

const codificador = new TextEncoder();
const decodificador = new TextDecoder();

export function longitudBytes(valor: string): number {
  return codificador.encode(valor).length;
}

/**
 * Recorta un texto para que su UTF-8 ocupe como maximo `maxBytes`.
 * Corta por puntos de codigo completos; nunca deja un caracter a medias.
 * Un NUL interno termina el texto (igual que al leerlo del archivo).
 * Los surrogates sueltos pasan a U+FFFD, como los escribe el archivo.
 */
export function truncarBytes(valor: string, maxBytes: number): string {
  const normalizado = decodificador.decode(codificador.encode(valor));
  const finNul = normalizado.indexOf('\0');
  const base = finNul >= 0 ? normalizado.slice(0, finNul) : normalizado;
  if (longitudBytes(base) <= maxBytes) return base;

  let usados = 0;
  let salida = '';
  for (const caracter of base) {
    const tam = longitudBytes(caracter);
    if (usados + tam > maxBytes) break;
    usados += tam;
    salida += caracter;
  }
  return salida;
}

const REGEX_FECHA = /^\d{2}\/\d{2}\/\d{4}$/;

/**
 * Fecha en formato DD/MM/YYYY. Solo se valida la forma: la fecha funciona
 * como clave de busqueda por igualdad exacta.
 */
export function esFechaValida(valor: string): boolean {
  return REGEX_FECHA.test(valor);
}
