import { fileURLToPath } from 'node:url';
import type { Config } from 'tailwindcss';

const fromHere = (glob: string) => fileURLToPath(new URL(glob, import.meta.url));

export default {
  content: [
    fromHere('./index.html'),
    fromHere('./src/**/*.{ts,tsx}'),
    fromHere('../../packages/ui/src/**/*.{ts,tsx}'),
  ],
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
