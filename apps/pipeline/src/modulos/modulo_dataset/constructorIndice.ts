/**
 * Construccion del indice del dataset.
 *
 * Contrato:
 * - Se recorre en el orden original; las formulas con resultado `null` o
 *   vacio no reciben id.
 * - Ids densos desde 0; una linea de indice por imagen del resultado.
 * - `formulas[id]` del artefacto de formulas es la formula de las filas con ese id.
 */
import { promises as fs } from 'fs';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { unirLineas } from '../../compartido/utilidades/texto';
import type { ResultadoRender } from '../modulo_render/types';

export type IndiceDataset = {
  lineasIndice: string[];
  formulas: string[];
};

export function construirIndice(formulas: readonly string[], resultados: readonly ResultadoRender[]): IndiceDataset {
  if (formulas.length !== resultados.length) {
    throw new ErrorAplicacion(
      'LONGITUDES_DISTINTAS',
      `Formulas y resultados no coinciden (${formulas.length} vs ${resultados.length})`
    );
  }

  const lineasIndice: string[] = [];
  const supervivientes: string[] = [];
  let contador = 0;
  formulas.forEach((formula, i) => {
    const resultado = resultados[i];
    if (!resultado || resultado.length === 0) return;
    for (const imagen of resultado) {
      lineasIndice.push(`${contador} ${imagen.nombreImagen} ${imagen.variante}`);
    }
    supervivientes.push(formula);
    contador += 1;
  });

  return { lineasIndice, formulas: supervivientes };
}

export async function escribirArtefactosDataset(
  indice: IndiceDataset,
  rutas: { archivoDataset: string; archivoFormulasDataset: string }
) {
  await fs.writeFile(rutas.archivoFormulasDataset, unirLineas(indice.formulas), 'utf8');
  await fs.writeFile(rutas.archivoDataset, indice.lineasIndice.join('\n'), 'utf8');
}
