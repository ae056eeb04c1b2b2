import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        // The library exports a combinator named `then`, which makes its module
        // namespace a thenable. Vite's module runner awaits namespaces and hangs
        // on it, so load modules natively (with tsx for TypeScript) instead.
        execArgv: ['--import', 'tsx'],
        experimental: {
            viteModuleRunner: false,
            nodeLoader: false,
        },
    },
});
