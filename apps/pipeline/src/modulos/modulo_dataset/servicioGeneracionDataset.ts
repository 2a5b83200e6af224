/**
 * Orquestacion de la generacion: lista de formulas -> imagenes + indice.
 *
 * Flujo: leer corpus -> muestrear -> renderizar -> indexar -> escribir.
 * Solo los errores de preparacion (archivo de entrada, directorio) abortan;
 * las fallas por formula quedan dentro del pool.
 */
import { promises as fs } from 'fs';
import path from 'node:path';
import { configuracion } from '../../configuracion';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { exportarMetricasPrometheus, obtenerResumenRender } from '../../compartido/observabilidad/metrics';
import type { FuenteAleatoria } from '../../compartido/utilidades/aleatoriedad';
import { separarLineas } from '../../compartido/utilidades/texto';
import { log } from '../../infraestructura/logging/logger';
import { fuenteParaSemilla, muestrearFormulas } from '../modulo_render/muestreo';
import { renderizarFormulas } from '../modulo_render/poolRender';
import type { EjecutorHerramienta, ProgresoRender, VerificadorRaster } from '../modulo_render/types';
import { construirIndice, escribirArtefactosDataset } from './constructorIndice';

export type OpcionesGeneracion = {
  maxImagenes?: number;
  directorioImagenes?: string;
  archivoDataset?: string;
  archivoFormulasDataset?: string;
  concurrencia?: number;
  fraccionProgreso?: number;
  timeoutHerramientaMs?: number;
  comandoCompilador?: string;
  comandoRasterizador?: string;
  verificarRaster?: boolean;
  registroHerramientas?: string;
  archivoMetricas?: string;
  aleatorio?: FuenteAleatoria;
  ejecutor?: EjecutorHerramienta;
  verificador?: VerificadorRaster;
  alProgreso?: (progreso: ProgresoRender) => void;
};

export type ResumenGeneracion = {
  leidas: number;
  muestreadas: number;
  renderizadas: number;
  filasIndice: number;
  duracionMs: number;
};

async function leerCorpus(archivoFormulas: string): Promise<string[]> {
  const contenido = await fs.readFile(archivoFormulas, 'utf8').catch((error: unknown) => {
    throw new ErrorAplicacion('ARCHIVO_NO_ENCONTRADO', `No se pudo leer el archivo de formulas: ${archivoFormulas}`, {
      causa: error instanceof Error ? error.message : String(error)
    });
  });
  return separarLineas(contenido).filter((linea) => linea.trim() !== '');
}

export async function generarDataset(archivoFormulas: string, opciones: OpcionesGeneracion = {}): Promise<ResumenGeneracion> {
  const inicio = Date.now();
  const directorioImagenes = opciones.directorioImagenes ?? configuracion.directorioImagenes;
  const archivoDataset = opciones.archivoDataset ?? configuracion.archivoDataset;
  const archivoFormulasDataset = opciones.archivoFormulasDataset ?? configuracion.archivoFormulasDataset;
  const archivoMetricas = opciones.archivoMetricas ?? configuracion.archivoMetricas;

  const corpus = await leerCorpus(archivoFormulas);
  const aleatorio = opciones.aleatorio ?? fuenteParaSemilla(configuracion.semillaMuestreo);
  const muestra = muestrearFormulas(corpus, opciones.maxImagenes ?? configuracion.maxImagenes, aleatorio);
  log('info', 'Formulas muestreadas', { leidas: corpus.length, muestreadas: muestra.length });

  await fs.mkdir(directorioImagenes, { recursive: true });

  const resultados = await renderizarFormulas(muestra, {
    directorioImagenes,
    concurrencia: opciones.concurrencia ?? configuracion.hilosRender,
    fraccionProgreso: opciones.fraccionProgreso ?? configuracion.fraccionProgreso,
    timeoutHerramientaMs: opciones.timeoutHerramientaMs ?? configuracion.timeoutHerramientaMs,
    comandoCompilador: opciones.comandoCompilador ?? configuracion.comandoCompilador,
    comandoRasterizador: opciones.comandoRasterizador ?? configuracion.comandoRasterizador,
    verificarRaster: opciones.verificarRaster ?? configuracion.verificarRaster,
    registroHerramientas: (opciones.registroHerramientas ?? configuracion.registroHerramientas) || undefined,
    ejecutor: opciones.ejecutor,
    verificador: opciones.verificador,
    alProgreso: opciones.alProgreso
  });

  const indice = construirIndice(muestra, resultados);
  await escribirArtefactosDataset(indice, { archivoDataset, archivoFormulasDataset });

  const duracionMs = Date.now() - inicio;
  const resumen: ResumenGeneracion = {
    leidas: corpus.length,
    muestreadas: muestra.length,
    renderizadas: indice.formulas.length,
    filasIndice: indice.lineasIndice.length,
    duracionMs
  };
  log('ok', 'Dataset generado', { ...resumen, render: obtenerResumenRender() });

  if (archivoMetricas) {
    await fs.mkdir(path.dirname(path.resolve(archivoMetricas)), { recursive: true });
    await fs.writeFile(archivoMetricas, `${exportarMetricasPrometheus()}\n`, 'utf8');
  }

  return resumen;
}
