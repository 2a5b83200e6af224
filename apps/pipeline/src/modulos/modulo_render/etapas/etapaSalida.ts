import { promises as fs } from 'fs';
import path from 'node:path';
import { ErrorRender } from '../../../compartido/robustez/errorRender';
import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import { EXTENSION_RASTER, VARIANTE_BASICA, type ContextoPipelineRender } from '../types';
import { requerirNombreBase } from './artefactos';

function escaparRegex(valor: string) {
  return valor.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rasters producidos para `nombreBase`: `<base>.png` o paginas `<base>-N.png`.
 */
export async function listarRastersProducidos(directorio: string, nombreBase: string): Promise<string[]> {
  const patron = new RegExp(`^${escaparRegex(nombreBase)}(-\\d+)?${escaparRegex(EXTENSION_RASTER)}$`);
  const nombres = await fs.readdir(directorio);
  return nombres.filter((nombre) => patron.test(nombre)).sort();
}

export async function ejecutarEtapaSalida(contexto: ContextoPipelineRender) {
  const nombreBase = requerirNombreBase(contexto);
  const rasters = await listarRastersProducidos(contexto.directorioImagenes, nombreBase);
  for (const nombre of rasters) contexto.manifiesto.add(path.join(contexto.directorioImagenes, nombre));

  if (rasters.length > 1) {
    throw new ErrorRender(
      'El rasterizador produjo mas de una imagen',
      CategoriaFalloRender.SALIDA_AMBIGUA,
      rasters.join(',')
    );
  }
  if (rasters.length === 0) {
    throw new ErrorRender('El rasterizador no produjo imagen', CategoriaFalloRender.RASTERIZADO);
  }

  const esperado = `${nombreBase}${EXTENSION_RASTER}`;
  if (rasters[0] !== esperado) {
    await fs.rename(path.join(contexto.directorioImagenes, rasters[0]), path.join(contexto.directorioImagenes, esperado));
  }
  contexto.resultado = [{ nombreImagen: nombreBase, variante: VARIANTE_BASICA }];
  return contexto;
}
