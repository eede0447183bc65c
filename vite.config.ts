import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
    // Load all env variables (empty prefix '' means load all, not just VITE_ prefixed)
    const env = loadEnv(mode, process.cwd(), '');
    console.log('Building with GROQ_API_KEY:', env.GROQ_API_KEY ? 'Found' : 'NOT FOUND');
    return {
      server: {
        port: 3000,
        host: '0.0.0.0',
      },
      plugins: [react()],
      define: {
        'process.env.GROQ_API_KEY': JSON.stringify(env.GROQ_API_KEY ?? ''),
        'process.env.GROQ_MODEL': JSON.stringify(env.GROQ_MODEL ?? ''),
        'process.env.GROQ_API_URL': JSON.stringify(env.GROQ_API_URL ?? ''),
      },
    };
});
