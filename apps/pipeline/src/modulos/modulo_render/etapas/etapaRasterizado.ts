import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import { EXTENSION_RASTER, type ContextoPipelineRender } from '../types';
import { registrarArtefacto, requerirNombreBase } from './artefactos';
import { invocarHerramienta } from './invocacion';

// .pdf -> .png de una sola pagina
export async function ejecutarEtapaRasterizado(contexto: ContextoPipelineRender) {
  const nombreBase = requerirNombreBase(contexto);
  registrarArtefacto(contexto, EXTENSION_RASTER);
  await invocarHerramienta(
    contexto,
    contexto.comandoRasterizador,
    [`${nombreBase}.pdf`, nombreBase, '-png', '-singlefile'],
    CategoriaFalloRender.RASTERIZADO
  );
  return contexto;
}
