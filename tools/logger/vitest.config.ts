import { defineConfig } from '../vitest-config/src/index';

export default defineConfig();
