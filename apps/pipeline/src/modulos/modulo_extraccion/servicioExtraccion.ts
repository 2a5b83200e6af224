/**
 * Servicio de extraccion: corpus de archivos -> lista unica de formulas.
 *
 * Escribe dos artefactos:
 * - `archivoFormulas`: formulas unicas, una por linea.
 * - `archivoFormulasNormalizadas`: secuencia sin `\label{...}`, sin deduplicar
 *   (informativa, mantiene el orden de deteccion).
 */
import { promises as fs } from 'fs';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { unirLineas } from '../../compartido/utilidades/texto';
import { log } from '../../infraestructura/logging/logger';
import { deduplicar } from './deduplicador';
import type { OpcionesExtraccion } from './extractorPatrones';
import { recorrerCorpus } from './recorridoCorpus';

export type ParametrosExtraccion = OpcionesExtraccion & {
  directorio: string;
  archivoFormulas: string;
  archivoFormulasNormalizadas: string;
};

export type ResumenExtraccion = {
  detectadas: number;
  unicas: number;
};

export async function extraerCorpus(parametros: ParametrosExtraccion): Promise<ResumenExtraccion> {
  const estadistica = await fs.stat(parametros.directorio).catch(() => null);
  if (!estadistica?.isDirectory()) {
    throw new ErrorAplicacion('DIRECTORIO_NO_ENCONTRADO', `No existe el directorio de archivos: ${parametros.directorio}`);
  }

  const { formulas, formulasNormalizadas } = await recorrerCorpus(parametros.directorio, parametros);
  const unicas = deduplicar(formulas);
  log('info', 'Formulas detectadas', { detectadas: formulas.length, unicas: unicas.length });

  await fs.writeFile(parametros.archivoFormulas, unirLineas(unicas), 'utf8');
  await fs.writeFile(parametros.archivoFormulasNormalizadas, unirLineas(formulasNormalizadas), 'utf8');

  return { detectadas: formulas.length, unicas: unicas.length };
}
