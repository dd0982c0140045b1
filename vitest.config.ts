import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspaces: Record<string, string> = {
  'declaration-dsl': 'packages/declaration-dsl',
  kernel: 'packages/kernel',
  'runtime-host': 'packages/runtime-host',
  'plugin-loader': 'packages/plugin-loader',
  console: 'packages/console',
  'plugin-management': 'modules/first-party/plugin-management',
  'plugin-fun': 'modules/first-party/fun',
};

const alias: Record<string, string> = {};
for (const [name, dir] of Object.entries(workspaces)) {
  alias[`@ordinance/${name}`] = fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/first-party/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
