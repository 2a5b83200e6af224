import path from 'node:path';
import { ErrorRender } from '../../../compartido/robustez/errorRender';
import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import type { ContextoPipelineRender } from '../types';

export function requerirNombreBase(contexto: ContextoPipelineRender): string {
  if (!contexto.nombreBase) {
    throw new ErrorRender('Etapa ejecutada sin direccion calculada', CategoriaFalloRender.INTERNO);
  }
  return contexto.nombreBase;
}

/**
 * Ruta `<directorio>/<nombreBase><extension>`; se agrega al manifiesto porque
 * la etapa que la pide puede dejarla en disco.
 */
export function registrarArtefacto(contexto: ContextoPipelineRender, extension: string): string {
  const ruta = path.join(contexto.directorioImagenes, `${requerirNombreBase(contexto)}${extension}`);
  contexto.manifiesto.add(ruta);
  return ruta;
}
