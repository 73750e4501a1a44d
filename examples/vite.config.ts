import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { readdirSync, statSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const examplesRoot = fileURLToPath(new URL('.', import.meta.url));

// Every subdirectory with an index.html is a demo page.
const demoInputs = Object.fromEntries(
  readdirSync(examplesRoot)
    .filter((name) => {
      const dir = resolve(examplesRoot, name);
      return statSync(dir).isDirectory() && readdirSync(dir).includes('index.html');
    })
    .map((name) => [name, resolve(examplesRoot, name, 'index.html')] as const)
);

export default defineConfig({
  root: examplesRoot,
  build: {
    outDir: resolve(examplesRoot, '..', 'dist-examples'),
    emptyOutDir: true,
    rollupOptions: {
      input: { main: resolve(examplesRoot, 'index.html'), ...demoInputs },
    },
  },
});
