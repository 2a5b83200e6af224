/**
 * Utilidades de texto para artefactos de una formula por linea.
 */

export function quitarSaltosLinea(valor: string): string {
  return String(valor ?? '').replace(/[\r\n]/g, '');
}

/**
 * Une registros con `\n` sin salto final; cada registro se limpia de saltos
 * porque el limite de linea es el delimitador del artefacto.
 */
export function unirLineas(registros: readonly string[]): string {
  return registros.map(quitarSaltosLinea).join('\n');
}

export function separarLineas(contenido: string): string[] {
  if (contenido === '') return [];
  return contenido.replace(/\r\n/g, '\n').split('\n');
}

/**
 * Cuenta lineas de un artefacto: 0 para archivo vacio; un salto final no
 * agrega una linea extra.
 */
export function contarLineas(contenido: string): number {
  if (contenido === '') return 0;
  return separarLineas(contenido.replace(/\r?\n$/, '')).length;
}
