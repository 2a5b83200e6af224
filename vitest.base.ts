/**
 * vitest.base
 *
 * Responsabilidad: Opciones Vitest compartidas por las apps del repositorio.
 * Limites: Cada app agrega su propio `include` y `setupFiles`.
 */
export const baseVitestConfig = {
  clearMocks: true,
  restoreMocks: true,
  mockReset: true,
  testTimeout: 20000,
  hookTimeout: 20000,
  coverage: {
    provider: 'v8' as const,
    reporter: ['text', 'lcov', 'json-summary'],
    exclude: ['**/dist/**', '**/node_modules/**', '**/tests/**', '**/*.d.ts']
  }
};
