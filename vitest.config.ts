import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // sharp and the in-process HTTP server need a real Node environment
    environment: 'node',
    coverage: {
      // Use v8 provider for coverage
      provider: 'v8',
      // Generate a text summary in the console as well as a full HTML report
      reporter: ['text', 'html'],
      // Specify which files to include in the coverage report
      include: ['src/**/*.ts'],
      // The bin entry only wires process globals into runCli
      exclude: ['src/main.ts', 'src/lib/types.ts'],
    },
  },
});
