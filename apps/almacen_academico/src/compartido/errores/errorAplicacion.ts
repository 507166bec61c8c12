/**
 * Error estandar del almacen.
 *
 * Las operaciones publicas no lanzan: reportan su resultado con
 * `ResultadoEscritura`. Este error se usa para:
 * - Envolver fallos de E/S antes de registrarlos (`PERSISTENCIA_*`).
 * - Rechazar una configuracion invalida al construir el almacen.
 *
 * Notas:
 * - `codigo` debe ser estable (orientado a maquina).
 * - `detalles` lleva contexto como la ruta del archivo o la causa original.
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.detalles = detalles;
  }
}
