/**
 * Esqueleto LaTeX minimo para una formula en modo display.
 */
const LINEAS_ESQUELETO = [
  '',
  '\\documentclass[12pt]{article}',
  '\\pagestyle{empty}',
  '\\usepackage{amsmath}',
  '\\begin{document}',
  '',
  '\\begin{displaymath}',
  '%s',
  '\\end{displaymath}',
  '',
  '\\end{document}',
  ''
];

export const ESQUELETO_BASICO = LINEAS_ESQUELETO.join('\n');

export function construirDocumento(formulaCanonica: string): string {
  // Se reemplaza con funcion para que `$&`/`$1` dentro de la formula no se interpreten.
  return ESQUELETO_BASICO.replace('%s', () => formulaCanonica);
}
