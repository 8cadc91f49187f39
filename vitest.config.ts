import path from 'node:path';
import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    include: ['src/**/*.spec.ts'],
    setupFiles: ['./src/shared/testing/setup.ts'],
    // Load `ws` through its CommonJS entry, as the compiled app does; its ESM
    // wrapper does not re-export the `Server` alias.
    alias: [{ find: /^ws$/, replacement: path.resolve(__dirname, 'node_modules/ws/index.js') }],
    server: { deps: { inline: ['ws'] } },
  },
  plugins: [swc.vite()],
});
