import {defineConfig, mergeConfig} from 'vitest/config';
import config from './src/tool/vitest-config.ts';

export default mergeConfig(
  config,
  defineConfig({
    test: {
      name: 'shared',
    },
  }),
);
