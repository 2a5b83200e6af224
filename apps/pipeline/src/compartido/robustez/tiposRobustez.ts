/**
 * Tipos y enumerados para el aislamiento de fallas por formula.
 */

export enum CategoriaFalloRender {
  DIRECCION = 'direccion',
  COMPILACION = 'compilacion',
  RASTERIZADO = 'rasterizado',
  SALIDA_AMBIGUA = 'salida_ambigua',
  TIEMPO_AGOTADO = 'tiempo_agotado',
  INTERNO = 'interno'
}

export interface FalloRender extends Error {
  categoria: CategoriaFalloRender;
  auditoria: string;
  duracionMs: number;
  direccion?: string;
}

export interface ResultadoHerramienta {
  ok: boolean;
  codigo: number;
  tiempoAgotado: boolean;
  duracionMs: number;
  error?: string;
}
