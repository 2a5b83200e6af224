/**
 * Recorre una coleccion de archivos `.tar.gz` con fuentes LaTeX y agrega las
 * formulas detectadas en cada documento.
 *
 * Solo se leen miembros cuyo nombre contiene `/` y que son archivos regulares;
 * las entradas de directorio se ignoran.
 */
import { promises as fs } from 'fs';
import path from 'path';
import * as tar from 'tar';
import { log } from '../../infraestructura/logging/logger';
import { extraerFormulas, type FormulasExtraidas, type OpcionesExtraccion } from './extractorPatrones';

export type DocumentoArchivo = { nombre: string; contenido: string };

export async function listarArchivosCorpus(directorio: string): Promise<string[]> {
  const nombres = await fs.readdir(directorio);
  return nombres
    .filter((nombre) => nombre.endsWith('.tar.gz'))
    .sort((a, b) => a.localeCompare(b))
    .map((nombre) => path.join(directorio, nombre));
}

export async function leerDocumentosArchivo(rutaArchivo: string): Promise<DocumentoArchivo[]> {
  const lecturas: Array<Promise<DocumentoArchivo>> = [];

  await tar.t({
    file: rutaArchivo,
    onentry: (entrada) => {
      if (entrada.type !== 'File' || !entrada.path.includes('/')) {
        entrada.resume();
        return;
      }
      const nombre = entrada.path;
      lecturas.push(
        new Promise<DocumentoArchivo>((resolve, reject) => {
          const partes: Buffer[] = [];
          entrada.on('data', (parte: Buffer) => partes.push(parte));
          entrada.on('end', () => resolve({ nombre, contenido: Buffer.concat(partes).toString('utf8') }));
          entrada.on('error', reject);
        })
      );
    }
  });

  return Promise.all(lecturas);
}

export async function recorrerCorpus(directorio: string, opciones: OpcionesExtraccion = {}): Promise<FormulasExtraidas> {
  const archivos = await listarArchivosCorpus(directorio);
  const formulas: string[] = [];
  const formulasNormalizadas: string[] = [];

  let procesados = 0;
  for (const archivo of archivos) {
    const documentos = await leerDocumentosArchivo(archivo);
    for (const documento of documentos) {
      const resultado = extraerFormulas(documento.contenido, opciones);
      formulas.push(...resultado.formulas);
      formulasNormalizadas.push(...resultado.formulasNormalizadas);
    }
    procesados += 1;
    log('info', 'Archivo procesado', { archivo: path.basename(archivo), procesados, total: archivos.length });
  }

  return { formulas, formulasNormalizadas };
}
