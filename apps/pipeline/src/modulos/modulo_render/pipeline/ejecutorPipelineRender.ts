import { promises as fs } from 'fs';
import { registrarEtapaRender, registrarPipelineRender, type EtapaRender } from '../../../compartido/observabilidad/metrics';
import { normalizarErrorRender } from '../../../compartido/robustez/errorRender';
import { logError } from '../../../infraestructura/logging/logger';
import { ejecutarEtapaCompilacion } from '../etapas/etapaCompilacion';
import { ejecutarEtapaDireccion } from '../etapas/etapaDireccion';
import { ejecutarEtapaPlantilla } from '../etapas/etapaPlantilla';
import { ejecutarEtapaRasterizado } from '../etapas/etapaRasterizado';
import { ejecutarEtapaSalida } from '../etapas/etapaSalida';
import { ejecutarEtapaVerificacion } from '../etapas/etapaVerificacion';
import type { ContextoPipelineRender, ResultadoPipelineRender } from '../types';

type EjecutorEtapa = (contexto: ContextoPipelineRender) => Promise<ContextoPipelineRender>;

const ETAPAS_HERRAMIENTAS: Array<[EtapaRender, EjecutorEtapa]> = [
  ['plantilla', ejecutarEtapaPlantilla],
  ['compilacion', ejecutarEtapaCompilacion],
  ['rasterizado', ejecutarEtapaRasterizado],
  ['salida', ejecutarEtapaSalida],
  ['verificacion', ejecutarEtapaVerificacion]
];

async function ejecutarConMetricas(
  etapa: EtapaRender,
  contexto: ContextoPipelineRender,
  ejecutor: EjecutorEtapa,
  reporteEtapas: ResultadoPipelineRender['etapas']
) {
  const inicio = Date.now();
  try {
    const siguiente = await ejecutor(contexto);
    const duracionMs = Date.now() - inicio;
    registrarEtapaRender(etapa, duracionMs, true);
    reporteEtapas.push({ etapa, duracionMs, exito: true });
    return siguiente;
  } catch (error) {
    const duracionMs = Date.now() - inicio;
    registrarEtapaRender(etapa, duracionMs, false);
    reporteEtapas.push({ etapa, duracionMs, exito: false });
    throw error;
  }
}

/**
 * Borra por nombre exacto los artefactos que la formula pudo dejar en disco.
 */
export async function limpiarManifiesto(manifiesto: Iterable<string>) {
  for (const ruta of manifiesto) {
    await fs.rm(ruta, { force: true });
  }
}

/**
 * Lleva una formula por direccion -> plantilla -> compilacion -> rasterizado
 * -> salida -> verificacion.
 *
 * Nunca rechaza: cualquier falla se contabiliza, limpia el manifiesto de la
 * formula y se reporta como `resultado: null`.
 */
export async function ejecutarPipelineRender(contextoInicial: ContextoPipelineRender): Promise<ResultadoPipelineRender> {
  const etapas: ResultadoPipelineRender['etapas'] = [];
  let contexto = { ...contextoInicial };
  const inicio = Date.now();

  try {
    contexto = await ejecutarConMetricas('direccion', contexto, ejecutarEtapaDireccion, etapas);
    if (contexto.omitida && contexto.resultado) {
      registrarPipelineRender('omitida', Date.now() - inicio);
      return { indice: contexto.indice, exito: true, omitida: true, resultado: contexto.resultado, etapas };
    }

    for (const [etapa, ejecutor] of ETAPAS_HERRAMIENTAS) {
      contexto = await ejecutarConMetricas(etapa, contexto, ejecutor, etapas);
    }

    if (!contexto.resultado) {
      throw new Error('Pipeline de render sin resultado final');
    }

    registrarPipelineRender('renderizada', Date.now() - inicio);
    return { indice: contexto.indice, exito: true, omitida: false, resultado: contexto.resultado, etapas };
  } catch (error) {
    const fallo = normalizarErrorRender(error, contexto.direccion);
    try {
      await limpiarManifiesto(contexto.manifiesto);
    } catch (errorLimpieza) {
      logError('No se pudieron borrar artefactos de una formula fallida', errorLimpieza, { direccion: fallo.direccion });
    }
    registrarPipelineRender(fallo.categoria, Date.now() - inicio);
    return {
      indice: contexto.indice,
      exito: false,
      omitida: false,
      resultado: null,
      categoriaFallo: fallo.categoria,
      etapas
    };
  }
}
