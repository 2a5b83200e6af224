import { promises as fs } from 'fs';
import path from 'node:path';
import { ErrorRender } from '../../../compartido/robustez/errorRender';
import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';
import { calcularDireccion } from '../direccionContenido';
import { EXTENSION_RASTER, VARIANTE_BASICA, type ContextoPipelineRender } from '../types';

export async function existeArchivo(ruta: string): Promise<boolean> {
  try {
    const estadistica = await fs.stat(ruta);
    return estadistica.isFile();
  } catch {
    return false;
  }
}

export async function ejecutarEtapaDireccion(contexto: ContextoPipelineRender) {
  let direccion: string;
  try {
    direccion = calcularDireccion(contexto.formula);
  } catch (error) {
    throw new ErrorRender(
      'No se pudo calcular la direccion de la formula',
      CategoriaFalloRender.DIRECCION,
      error instanceof Error ? error.message : String(error)
    );
  }
  contexto.direccion = direccion;
  contexto.nombreBase = `${direccion}_${VARIANTE_BASICA}`;

  // Reanudacion idempotente: un raster existente se da por renderizado.
  const rutaRaster = path.join(contexto.directorioImagenes, `${contexto.nombreBase}${EXTENSION_RASTER}`);
  if (await existeArchivo(rutaRaster)) {
    contexto.omitida = true;
    contexto.resultado = [{ nombreImagen: contexto.nombreBase, variante: VARIANTE_BASICA }];
  }
  return contexto;
}
