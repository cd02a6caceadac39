import { genkit } from 'genkit';
import { googleAI } from '@genkit-ai/googleai';
import { newsConfig } from '@/services/news-config';

export const ai = genkit({
  plugins: [
    googleAI({
      apiKey: newsConfig.geminiApiKey,
    }),
  ],
  model: `googleai/${newsConfig.geminiModel}`,
});
