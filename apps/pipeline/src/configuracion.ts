/**
 * Configuracion centralizada del pipeline de formulas.
 */
import dotenv from 'dotenv';
import os from 'node:os';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

export function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || String(valor).trim() === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

export function parsearBandera(valor: unknown, porDefecto: boolean) {
  const raw = String(valor ?? '').trim().toLowerCase();
  if (!raw) return porDefecto;
  return ['1', 'true', 'yes', 'on'].includes(raw);
}

const entorno = process.env.NODE_ENV ?? 'development';

// Tope de formulas que entran al render despues de barajar.
const maxImagenes = Math.floor(parsearNumeroSeguro(process.env.MAX_IMAGENES, 300_000, { min: 1, max: 10_000_000 }));

// Cadencia de progreso como fraccion del total real de formulas a renderizar.
const fraccionProgreso = parsearNumeroSeguro(process.env.FRACCION_PROGRESO, 0.0001, { min: 0.000001, max: 1 });

const hilosRender = Math.floor(
  parsearNumeroSeguro(process.env.HILOS_RENDER, os.cpus().length * 2 + 1, { min: 1, max: 512 })
);

const directorioImagenes = String(process.env.DIRECTORIO_IMAGENES ?? 'formula_images').trim() || 'formula_images';
const archivoDataset = String(process.env.ARCHIVO_DATASET ?? 'im2latex.lst').trim() || 'im2latex.lst';
const archivoFormulasDataset =
  String(process.env.ARCHIVO_FORMULAS_DATASET ?? 'im2latex_formulas.lst').trim() || 'im2latex_formulas.lst';

const minLongitudFormula = Math.floor(parsearNumeroSeguro(process.env.MIN_LONGITUD_FORMULA, 40, { min: 0, max: 100_000 }));
const maxLongitudFormula = Math.floor(
  parsearNumeroSeguro(process.env.MAX_LONGITUD_FORMULA, 1024, { min: minLongitudFormula + 1, max: 1_000_000 })
);

const comandoCompilador = String(process.env.COMANDO_COMPILADOR ?? 'pdflatex').trim() || 'pdflatex';
const comandoRasterizador = String(process.env.COMANDO_RASTERIZADOR ?? 'pdftoppm').trim() || 'pdftoppm';
const timeoutHerramientaMs = parsearNumeroSeguro(process.env.TIMEOUT_HERRAMIENTA_MS, 60_000, { min: 100, max: 3_600_000 });

// Vacio = la salida de pdflatex/pdftoppm se descarta.
const registroHerramientas = String(process.env.REGISTRO_HERRAMIENTAS ?? '').trim();

const semillaMuestreo = (() => {
  const raw = String(process.env.SEMILLA_MUESTREO ?? '').trim();
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
})();

const verificarRaster = parsearBandera(process.env.VERIFICAR_RASTER, true);
const archivoMetricas = String(process.env.ARCHIVO_METRICAS ?? '').trim();

export const configuracion = Object.freeze({
  entorno,
  maxImagenes,
  fraccionProgreso,
  hilosRender,
  directorioImagenes,
  archivoDataset,
  archivoFormulasDataset,
  minLongitudFormula,
  maxLongitudFormula,
  comandoCompilador,
  comandoRasterizador,
  timeoutHerramientaMs,
  registroHerramientas,
  semillaMuestreo,
  verificarRaster,
  archivoMetricas
});

export type Configuracion = typeof configuracion;
