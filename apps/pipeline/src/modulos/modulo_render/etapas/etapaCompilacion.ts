import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import type { ContextoPipelineRender } from '../types';
import { registrarArtefacto, requerirNombreBase } from './artefactos';
import { invocarHerramienta } from './invocacion';

// .tex -> .pdf (el compilador tambien deja .log y .aux)
export async function ejecutarEtapaCompilacion(contexto: ContextoPipelineRender) {
  const nombreBase = requerirNombreBase(contexto);
  registrarArtefacto(contexto, '.pdf');
  registrarArtefacto(contexto, '.log');
  registrarArtefacto(contexto, '.aux');
  await invocarHerramienta(
    contexto,
    contexto.comandoCompilador,
    ['-interaction=nonstopmode', '-halt-on-error', `${nombreBase}.tex`],
    CategoriaFalloRender.COMPILACION
  );
  return contexto;
}
