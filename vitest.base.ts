/**
 * vitest.base
 *
 * Responsabilidad: Opciones Vitest compartidas por los paquetes del workspace.
 * Limites: Solo opciones comunes; cada paquete define include y setup.
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
    include: ['src/**/*.ts'],
    exclude: ['**/dist/**', '**/node_modules/**', '**/tests/**', '**/*.d.ts']
  }
};
