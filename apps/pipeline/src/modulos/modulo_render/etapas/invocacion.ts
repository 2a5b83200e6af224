import { ErrorRender } from '../../../compartido/robustez/errorRender';
import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import type { ContextoPipelineRender } from '../types';

/**
 * Ejecuta una herramienta en el directorio de imagenes y convierte codigo
 * distinto de 0 o tiempo agotado en ErrorRender de la categoria indicada.
 */
export async function invocarHerramienta(
  contexto: ContextoPipelineRender,
  comando: string,
  argumentos: string[],
  categoria: CategoriaFalloRender
) {
  const resultado = await contexto.ejecutor.ejecutar({
    comando,
    argumentos,
    cwd: contexto.directorioImagenes,
    timeoutMs: contexto.timeoutHerramientaMs,
    salida: contexto.salida
  });
  if (resultado.ok) return resultado;

  const auditoria = `${comando} ${argumentos.join(' ')} -> codigo ${resultado.codigo}${resultado.error ? ` (${resultado.error})` : ''}`;
  if (resultado.tiempoAgotado) {
    throw new ErrorRender(`Tiempo agotado en ${comando}`, CategoriaFalloRender.TIEMPO_AGOTADO, auditoria, resultado.duracionMs);
  }
  throw new ErrorRender(`${comando} termino con codigo ${resultado.codigo}`, categoria, auditoria, resultado.duracionMs);
}
