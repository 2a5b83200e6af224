import { barajar, crearAleatorioDeterminista, type FuenteAleatoria } from '../../compartido/utilidades/aleatoriedad';

/**
 * Baraja y trunca: subconjunto aleatorio uniforme de a lo sumo `maximo`
 * formulas (no las primeras `maximo`).
 */
export function muestrearFormulas(formulas: readonly string[], maximo: number, aleatorio: FuenteAleatoria = Math.random): string[] {
  return barajar(formulas, aleatorio).slice(0, Math.max(0, Math.floor(maximo)));
}

export function fuenteParaSemilla(semilla?: number): FuenteAleatoria {
  return semilla === undefined ? Math.random : crearAleatorioDeterminista(semilla);
}
