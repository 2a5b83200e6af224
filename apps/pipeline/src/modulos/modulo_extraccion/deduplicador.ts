/**
 * Colapsa formulas a un conjunto unico por igualdad exacta de texto crudo.
 * El orden de salida (primera aparicion) no es significativo en esta etapa.
 */
export function deduplicar(formulas: readonly string[]): string[] {
  return Array.from(new Set(formulas));
}
