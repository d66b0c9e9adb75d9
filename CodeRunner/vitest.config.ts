import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from '../vitest.base.js';

// Integration tests spawn real child processes and share the stand-in interpreter
export default mergeConfig(baseConfig, defineConfig({
  test: {
    name: 'coderunner',
    fileParallelism: false,
  },
}));
