import sharp from 'sharp';
import { ErrorRender } from '../../../compartido/robustez/errorRender';
import { CategoriaFalloRender } from '../../../compartido/robustez/tiposRobustez';

/**
 * Decodifica el PNG con sharp; una imagen ilegible o de tamano cero cuenta
 * como falla de rasterizado.
 */
export async function verificarRasterSharp(rutaImagen: string): Promise<void> {
  let ancho = 0;
  let alto = 0;
  try {
    const metadatos = await sharp(rutaImagen).metadata();
    ancho = metadatos.width ?? 0;
    alto = metadatos.height ?? 0;
  } catch (error) {
    throw new ErrorRender(
      'Raster ilegible',
      CategoriaFalloRender.RASTERIZADO,
      error instanceof Error ? error.message : String(error)
    );
  }
  if (ancho <= 0 || alto <= 0) {
    throw new ErrorRender('Raster vacio', CategoriaFalloRender.RASTERIZADO, `${ancho}x${alto}`);
  }
}
