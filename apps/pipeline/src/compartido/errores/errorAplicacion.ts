/**
 * Error estandar para fallas de preparacion del pipeline.
 *
 * Se usa para errores que deben abortar la corrida completa (archivos o
 * directorios inexistentes, entradas incoherentes), a diferencia de las fallas
 * por formula, que nunca salen del pool de render.
 *
 * Notas:
 * - `codigo` debe ser estable (orientado a maquina) para scripts y pruebas.
 * - `detalles` se usa principalmente para errores de validacion (p. ej. `zod.flatten()`).
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
