import { defineConfig } from './src/index';

export default defineConfig();
