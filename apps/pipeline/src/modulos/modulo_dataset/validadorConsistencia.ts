/**
 * Diagnostico de consistencia entre indice, lista de formulas e imagenes.
 *
 * Solo reporta: no modifica artefactos ni lanza por discrepancias.
 */
import { promises as fs } from 'fs';
import { contarLineas, separarLineas } from '../../compartido/utilidades/texto';
import { esquemaFilaIndice } from '../../compartido/validaciones/esquemas';
import { EXTENSION_RASTER } from '../modulo_render/types';

export type ReporteConsistencia = {
  filasIndice: number;
  filasInvalidas: number;
  maxId: number;
  lineasFormulas: number;
  longitudCoincide: boolean;
  imagenesFaltantes: number;
};

export async function validarDataset(
  archivoIndice: string,
  archivoFormulas: string,
  directorioImagenes: string
): Promise<ReporteConsistencia> {
  const [contenidoIndice, contenidoFormulas, imagenes] = await Promise.all([
    fs.readFile(archivoIndice, 'utf8'),
    fs.readFile(archivoFormulas, 'utf8'),
    fs.readdir(directorioImagenes)
  ]);
  const imagenesPresentes = new Set(imagenes);

  let filasIndice = 0;
  let filasInvalidas = 0;
  let maxId = -1;
  let imagenesFaltantes = 0;

  for (const linea of separarLineas(contenidoIndice)) {
    if (linea.trim() === '') continue;
    filasIndice += 1;
    const fila = esquemaFilaIndice.safeParse(linea);
    if (!fila.success) {
      filasInvalidas += 1;
      continue;
    }
    maxId = Math.max(maxId, fila.data.id);
    if (!imagenesPresentes.has(`${fila.data.nombreImagen}${EXTENSION_RASTER}`)) {
      imagenesFaltantes += 1;
    }
  }

  const lineasFormulas = contarLineas(contenidoFormulas);
  return {
    filasIndice,
    filasInvalidas,
    maxId,
    lineasFormulas,
    longitudCoincide: maxId + 1 === lineasFormulas,
    imagenesFaltantes
  };
}

export function describirReporte(reporte: ReporteConsistencia): string[] {
  const lineas: string[] = [];
  if (!reporte.longitudCoincide) {
    lineas.push(`Max id in dataset != formula_file length (${reporte.maxId} vs ${reporte.lineasFormulas})`);
  }
  if (reporte.filasInvalidas > 0) {
    lineas.push(`${reporte.filasInvalidas} malformed index rows`);
  }
  lineas.push(`${reporte.imagenesFaltantes} files missing`);
  return lineas;
}
