/**
 * Deteccion de formulas LaTeX por delimitadores.
 *
 * Contrato:
 * - Los patrones se aplican en orden y sus coincidencias se concatenan; un
 *   mismo tramo puede aparecer varias veces si cumple varios delimitadores.
 * - Se conserva un tramo si `minLongitud < largo < maxLongitud` (largo del
 *   tramo recortado, en puntos de codigo).
 * - Los `\n` y `\r` internos se eliminan (no se sustituyen por espacios).
 * - `formulasNormalizadas[i]` es `formulas[i]` sin construcciones `\label{...}`.
 */
import { configuracion } from '../../configuracion';
import { quitarSaltosLinea } from '../../compartido/utilidades/texto';

export const PATRONES_FORMULA: readonly RegExp[] = [
  /\\begin\{equation\}(.*?)\\end\{equation\}/gs,
  /\$\$(.*?)\$\$/gs,
  /\$(.*?)\$/gs,
  /\\\[(.*?)\\\]/gs,
  /\\\((.*?)\\\)/gs
];

// Admite un nivel de llaves anidadas: `\label{eq:{a}}`.
const PATRON_ETIQUETA = /\\label\{(?:[^{}]|\{[^{}]*\})*\}/g;

export type OpcionesExtraccion = {
  minLongitud?: number;
  maxLongitud?: number;
};

export type FormulasExtraidas = {
  formulas: string[];
  formulasNormalizadas: string[];
};

export function quitarEtiquetas(formula: string): string {
  return formula.replace(PATRON_ETIQUETA, '');
}

export function extraerFormulas(documento: string, opciones: OpcionesExtraccion = {}): FormulasExtraidas {
  const minLongitud = opciones.minLongitud ?? configuracion.minLongitudFormula;
  const maxLongitud = opciones.maxLongitud ?? configuracion.maxLongitudFormula;
  const formulas: string[] = [];
  const formulasNormalizadas: string[] = [];

  for (const patron of PATRONES_FORMULA) {
    for (const coincidencia of documento.matchAll(patron)) {
      const tramo = (coincidencia[1] ?? '').trim();
      const largo = [...tramo].length;
      if (largo <= minLongitud || largo >= maxLongitud) continue;
      const formula = quitarSaltosLinea(tramo);
      formulas.push(formula);
      formulasNormalizadas.push(quitarEtiquetas(formula));
    }
  }

  return { formulas, formulasNormalizadas };
}
