/**
 * vitest.config
 *
 * Responsabilidad: Configuracion Vitest del almacen academico.
 * Limites: Pruebas en proceso; cada una usa su propia carpeta temporal.
 */
import { defineConfig } from 'vitest/config';
import { baseVitestConfig } from '../../vitest.base';

export default defineConfig({
  test: {
    ...baseVitestConfig,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      ...baseVitestConfig.coverage,
      // index.ts solo reexporta.
      exclude: [...baseVitestConfig.coverage.exclude, 'src/index.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      }
    }
  }
});
