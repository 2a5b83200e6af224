/**
 * Direccion por contenido: identificador estable y seguro para nombre de archivo.
 *
 * Misma formula (tras canonicalizar) => misma direccion en cualquier corrida y
 * plataforma; se usa para omitir formulas ya renderizadas y como nombre base
 * de la imagen.
 */
import { createHash } from 'node:crypto';

export const LONGITUD_DIRECCION = 20;

/**
 * Quita los `%` iniciales: comentarian la formula dentro de la plantilla.
 * Un `%` final puede ser parte de `\%` y se conserva.
 */
export function canonicalizarFormula(formula: string): string {
  return formula.replace(/^%+/, '');
}

export function calcularDireccion(formula: string): string {
  return createHash('sha1').update(canonicalizarFormula(formula), 'utf8').digest('hex').slice(0, LONGITUD_DIRECCION);
}
