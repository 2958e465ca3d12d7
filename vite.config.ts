import { defineConfig } from 'vite';
import type { Plugin } from 'vite';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { renameSync, existsSync, rmSync } from 'node:fs';

const root = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vite plugin that moves the page's HTML from dist/src/page/ to dist/
 * after the build, so the site serves from the dist root.
 */
function moveHtmlPlugin(): Plugin {
    return {
        name: 'move-html-output',
        closeBundle() {
            const dist = resolve(root, 'dist');
            const srcDir = resolve(dist, 'src');
            const srcHtml = resolve(srcDir, 'page', 'index.html');
            if (!existsSync(srcHtml)) return;

            renameSync(srcHtml, resolve(dist, 'index.html'));
            console.log('  Moved index.html → dist/');
            rmSync(srcDir, { recursive: true, force: true });
        },
    };
}

export default defineConfig({
    plugins: [moveHtmlPlugin()],
    resolve: {
        alias: {
            '@shared': resolve(root, 'src/shared'),
            '@modules': resolve(root, 'src/modules'),
            '@lib': resolve(root, 'src/lib'),
        },
    },
    build: {
        outDir: 'dist',
        emptyOutDir: true,
        sourcemap: process.env.NODE_ENV === 'development' ? 'inline' : false,
        target: 'es2022',
        rollupOptions: {
            input: {
                page: resolve(root, 'src/page/index.html'),
            },
            output: {
                entryFileNames: 'assets/[name]-[hash].js',
                chunkFileNames: 'chunks/[name]-[hash].js',
                assetFileNames: 'assets/[name]-[hash][extname]',
            },
        },
    },
});
