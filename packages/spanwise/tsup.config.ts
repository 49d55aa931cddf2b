import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (Spanwise namespace + named exports)
    index: 'src/index.ts',

    // =========================================================================
    // Value types
    // =========================================================================
    duration: 'src/duration-entry.ts',
    instant: 'src/instant-entry.ts',

    // =========================================================================
    // Clocks and measurement
    // =========================================================================
    clock: 'src/clock-entry.ts',
    measure: 'src/measure-entry.ts',

    // =========================================================================
    // Errors and results
    // =========================================================================
    result: 'src/result.ts',
    errors: 'src/errors-entry.ts',
    'tagged-error': 'src/tagged-error-entry.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
