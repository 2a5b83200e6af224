/**
 * metrics
 *
 * Responsabilidad: Contadores de etapas y formulas del render para operacion.
 * Limites: Evitar romper nombres de metricas o formato de exportacion.
 */
import type { CategoriaFalloRender } from '../robustez/tiposRobustez';

export type EtapaRender = 'direccion' | 'plantilla' | 'compilacion' | 'rasterizado' | 'salida' | 'verificacion';
export type DesenlaceFormula = 'renderizada' | 'omitida' | CategoriaFalloRender;

const inicioDelProceso = Date.now();

const etapasDuracionMs = new Map<EtapaRender, number>();
const etapasTotales = new Map<`${EtapaRender}|${'ok' | 'error'}`, number>();
const formulasPorDesenlace = new Map<DesenlaceFormula, number>();
const pipelineTotales = { total: 0, errores: 0, duracionAcumuladaMs: 0 };

export function registrarEtapaRender(etapa: EtapaRender, duracionMs: number, exito: boolean) {
  const claveTotal = `${etapa}|${exito ? 'ok' : 'error'}` as const;
  etapasTotales.set(claveTotal, (etapasTotales.get(claveTotal) ?? 0) + 1);
  etapasDuracionMs.set(etapa, (etapasDuracionMs.get(etapa) ?? 0) + Math.max(0, duracionMs));
}

export function registrarPipelineRender(desenlace: DesenlaceFormula, duracionMs: number) {
  pipelineTotales.total += 1;
  pipelineTotales.duracionAcumuladaMs += Math.max(0, duracionMs);
  if (desenlace !== 'renderizada' && desenlace !== 'omitida') pipelineTotales.errores += 1;
  formulasPorDesenlace.set(desenlace, (formulasPorDesenlace.get(desenlace) ?? 0) + 1);
}

export function obtenerResumenRender() {
  const porDesenlace: Partial<Record<DesenlaceFormula, number>> = {};
  for (const [desenlace, valor] of formulasPorDesenlace.entries()) porDesenlace[desenlace] = valor;
  return {
    total: pipelineTotales.total,
    errores: pipelineTotales.errores,
    porDesenlace,
    duracionPromedioMs:
      pipelineTotales.total > 0 ? Number((pipelineTotales.duracionAcumuladaMs / pipelineTotales.total).toFixed(2)) : 0
  };
}

export function reiniciarMetricas() {
  etapasDuracionMs.clear();
  etapasTotales.clear();
  formulasPorDesenlace.clear();
  pipelineTotales.total = 0;
  pipelineTotales.errores = 0;
  pipelineTotales.duracionAcumuladaMs = 0;
}

export function exportarMetricasPrometheus(): string {
  const lineas: string[] = [];
  lineas.push('# HELP dataset_formulas_process_uptime_seconds Uptime del proceso');
  lineas.push('# TYPE dataset_formulas_process_uptime_seconds gauge');
  lineas.push(`dataset_formulas_process_uptime_seconds ${Math.floor((Date.now() - inicioDelProceso) / 1000)}`);

  lineas.push('');
  lineas.push('# HELP dataset_formulas_stage_duration_ms Duracion acumulada de etapas de render en milisegundos');
  lineas.push('# TYPE dataset_formulas_stage_duration_ms counter');
  for (const [etapa, valor] of etapasDuracionMs.entries()) {
    lineas.push(`dataset_formulas_stage_duration_ms{stage="${etapa}"} ${valor}`);
  }

  lineas.push('');
  lineas.push('# HELP dataset_formulas_stage_total Total de ejecuciones por etapa de render y estado');
  lineas.push('# TYPE dataset_formulas_stage_total counter');
  for (const [clave, valor] of etapasTotales.entries()) {
    const [etapa, estado] = clave.split('|');
    lineas.push(`dataset_formulas_stage_total{stage="${etapa}",status="${estado}"} ${valor}`);
  }

  lineas.push('');
  lineas.push('# HELP dataset_formulas_render_total Total de formulas procesadas por desenlace');
  lineas.push('# TYPE dataset_formulas_render_total counter');
  for (const [desenlace, valor] of formulasPorDesenlace.entries()) {
    lineas.push(`dataset_formulas_render_total{outcome="${desenlace}"} ${valor}`);
  }

  lineas.push('');
  lineas.push('# HELP dataset_formulas_render_error_total Total de formulas sin imagen');
  lineas.push('# TYPE dataset_formulas_render_error_total counter');
  lineas.push(`dataset_formulas_render_error_total ${pipelineTotales.errores}`);

  lineas.push('');
  lineas.push('# HELP dataset_formulas_render_duration_ms Promedio de duracion del pipeline por formula en milisegundos');
  lineas.push('# TYPE dataset_formulas_render_duration_ms gauge');
  const promedio = pipelineTotales.total > 0 ? pipelineTotales.duracionAcumuladaMs / pipelineTotales.total : 0;
  lineas.push(`dataset_formulas_render_duration_ms ${Number(promedio.toFixed(2))}`);

  return lineas.join('\n');
}
