import { defineConfig } from 'vitest/config';

export default defineConfig({
  build: {
    // Leave site-loader's `../scrapers/${domain}.js` import to the module resolver
    // (Vite's glob rewrite cannot map the .js specifier to the .ts source)
    dynamicImportVarsOptions: { exclude: ['src/drivers/site-loader.ts'] }
  },
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 10000
  }
});
