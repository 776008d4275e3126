import { defineConfig } from 'vitest/config';

/**
 * Vitest 配置文件
 *
 * 用于配置单元测试环境，包括：
 * - TypeScript 支持
 * - 测试环境设置
 * - 覆盖率配置
 */
export default defineConfig({
    test: {
        // 测试环境：Node.js（CLI 与 git hook 都运行在 Node.js 环境中）
        environment: 'node',

        // 测试文件匹配模式
        include: ['src/**/*.{test,spec}.ts'],

        // 排除的文件/目录
        exclude: ['node_modules', 'dist'],

        // 全局设置（可以在测试文件中直接使用 describe、it、expect 等）
        globals: true,

        // 覆盖率配置
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            exclude: [
                'node_modules/',
                'dist/',
                'src/__tests__/',
                '**/*.test.ts',
                '**/helpers/**',
                'src/cli.ts',
                'src/hooks/hookRunner.ts',
            ],
            thresholds: {
                lines: 75,
                functions: 75,
                branches: 70,
                statements: 75,
            },
        },

        testTimeout: 10000,

        // 每个测试文件运行前重置日志输出
        setupFiles: ['./src/__tests__/setup.ts'],
    },
});
