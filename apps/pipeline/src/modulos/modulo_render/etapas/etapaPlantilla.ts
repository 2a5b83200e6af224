import { promises as fs } from 'fs';
import { canonicalizarFormula } from '../direccionContenido';
import { construirDocumento } from '../plantillaDocumento';
import type { ContextoPipelineRender } from '../types';
import { registrarArtefacto } from './artefactos';

export async function ejecutarEtapaPlantilla(contexto: ContextoPipelineRender) {
  const rutaFuente = registrarArtefacto(contexto, '.tex');
  await fs.writeFile(rutaFuente, construirDocumento(canonicalizarFormula(contexto.formula)), 'utf8');
  return contexto;
}
