import type { Config } from 'tailwindcss';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default {
  content: [`${root}index.html`, `${root}src/**/*.{ts,tsx}`],
  theme: {
    extend: {
      colors: {
        surface: {
          DEFAULT: '#0f1115',
          card: '#171a21',
          hover: '#1f232c',
        },
        border: {
          DEFAULT: '#2a2f3a',
          focus: '#6366f1',
        },
      },
    },
  },
  plugins: [],
} satisfies Config;
