/**
 * Tabla en memoria indexada por una clave unica.
 *
 * Contrato:
 * - Conserva el orden de insercion; los listados y el archivo lo respetan.
 * - `capacidad` es un tope duro: insertar con la tabla llena falla sin mutar.
 * - Cambiar la clave de un registro no altera su posicion.
 */
import { CategoriaFallo, exito, fallo, type Resultado } from '../resultados/tiposResultado';

/**
 * Limite de listado comun a todas las tablas: se trunca a entero; sin limite
 * lista todo y un limite no positivo (o NaN) no lista nada.
 */
export function normalizarLimite(limite = Number.POSITIVE_INFINITY): number {
  return limite > 0 ? Math.floor(limite) : 0;
}

export class TablaIndexada<K, V> {
  private registros = new Map<K, V>();

  constructor(
    readonly capacidad: number,
    private readonly claveDe: (valor: V) => K
  ) {}

  get total() {
    return this.registros.size;
  }

  get llena() {
    return this.registros.size >= this.capacidad;
  }

  tiene(clave: K): boolean {
    return this.registros.has(clave);
  }

  obtener(clave: K): V | undefined {
    return this.registros.get(clave);
  }

  insertar(valor: V): Resultado<V> {
    if (this.llena) return fallo(CategoriaFallo.CAPACIDAD_EXCEDIDA);
    const clave = this.claveDe(valor);
    if (this.registros.has(clave)) return fallo(CategoriaFallo.CONFLICTO);
    this.registros.set(clave, valor);
    return exito(valor);
  }

  /**
   * Sustituye el registro de `clave` conservando su posicion.
   * `actualizar` no debe cambiar la clave; para eso existe `cambiarClave`.
   */
  modificar(clave: K, actualizar: (actual: V) => V): Resultado<V> {
    const actual = this.registros.get(clave);
    if (actual === undefined) return fallo(CategoriaFallo.NO_ENCONTRADO);
    const nuevo = actualizar(actual);
    this.registros.set(clave, nuevo);
    return exito(nuevo);
  }

  /**
   * Reasigna la clave de un registro. Misma clave: exito sin cambios.
   * La clave nueva ocupada tiene prioridad sobre la clave anterior ausente.
   */
  cambiarClave(anterior: K, nueva: K, reclavar: (actual: V, nueva: K) => V): Resultado<V | undefined> {
    if (anterior === nueva) return exito(this.registros.get(anterior));
    if (this.registros.has(nueva)) return fallo(CategoriaFallo.CONFLICTO);
    const actual = this.registros.get(anterior);
    if (actual === undefined) return fallo(CategoriaFallo.NO_ENCONTRADO);

    const reclavado = reclavar(actual, nueva);
    const reordenado = new Map<K, V>();
    for (const [clave, valor] of this.registros) {
      if (clave === anterior) reordenado.set(nueva, reclavado);
      else reordenado.set(clave, valor);
    }
    this.registros = reordenado;
    return exito(reclavado);
  }

  eliminar(clave: K): boolean {
    return this.registros.delete(clave);
  }

  /** Elimina todos los registros que cumplan `predicado`; devuelve cuantos. */
  eliminarDonde(predicado: (valor: V) => boolean): number {
    let eliminados = 0;
    for (const [clave, valor] of this.registros) {
      if (predicado(valor)) {
        this.registros.delete(clave);
        eliminados += 1;
      }
    }
    return eliminados;
  }

  /** Aplica `actualizar` a los registros que cumplan `predicado`; devuelve cuantos. */
  modificarDonde(predicado: (valor: V) => boolean, actualizar: (actual: V) => V): number {
    let modificados = 0;
    for (const [clave, valor] of this.registros) {
      if (predicado(valor)) {
        this.registros.set(clave, actualizar(valor));
        modificados += 1;
      }
    }
    return modificados;
  }

  valores(limite = Number.POSITIVE_INFINITY): V[] {
    return this.filtrar(() => true, limite);
  }

  filtrar(predicado: (valor: V) => boolean, limite = Number.POSITIVE_INFINITY): V[] {
    const salida: V[] = [];
    const maximo = normalizarLimite(limite);
    if (maximo === 0) return salida;
    for (const valor of this.registros.values()) {
      if (salida.length >= maximo) break;
      if (predicado(valor)) salida.push(valor);
    }
    return salida;
  }

  vaciar() {
    this.registros.clear();
  }
}
