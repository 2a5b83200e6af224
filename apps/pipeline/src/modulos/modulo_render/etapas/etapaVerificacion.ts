import path from 'node:path';
import { EXTENSION_RASTER, type ContextoPipelineRender } from '../types';
import { requerirNombreBase } from './artefactos';

export async function ejecutarEtapaVerificacion(contexto: ContextoPipelineRender) {
  if (!contexto.verificador) return contexto;
  const nombreBase = requerirNombreBase(contexto);
  await contexto.verificador(path.join(contexto.directorioImagenes, `${nombreBase}${EXTENSION_RASTER}`));
  return contexto;
}
