/**
 * Utilidades de aleatoriedad con fuente inyectable.
 */

export type FuenteAleatoria = () => number;

export function crearAleatorioDeterminista(semilla: number): FuenteAleatoria {
  // mulberry32
  let estado = semilla >>> 0;
  return function () {
    let t = (estado += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates sobre una copia; el arreglo original no se muta.
 */
export function barajar<T>(items: readonly T[], aleatorio: FuenteAleatoria = Math.random): T[] {
  const copia = items.slice();
  for (let i = copia.length - 1; i > 0; i -= 1) {
    const j = Math.floor(aleatorio() * (i + 1));
    const tmp = copia[i];
    copia[i] = copia[j];
    copia[j] = tmp;
  }
  return copia;
}
