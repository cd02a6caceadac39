'use server';

/**
 * @fileOverview Summarizes the plain text of a news article in a bounded number of words.
 *
 * - summarizeArticle - A function that summarizes a news article.
 * - SummarizeArticleInput - The input type for the summarizeArticle function.
 * - SummarizeArticleOutput - The return type for the summarizeArticle function.
 */

import {ai} from '@/ai/ai-instance';
import {z} from 'genkit';

const SummarizeArticleInputSchema = z.object({
  content: z.string().describe('The plain text content of the news article to summarize.'),
  wordLimit: z.number().int().positive().describe('The maximum number of words the summary should use.'),
});
export type SummarizeArticleInput = z.infer<typeof SummarizeArticleInputSchema>;

const SummarizeArticleOutputSchema = z.object({
  summary: z.string().describe('The trimmed summary text returned by the model.'),
});
export type SummarizeArticleOutput = z.infer<typeof SummarizeArticleOutputSchema>;

export async function summarizeArticle(input: SummarizeArticleInput): Promise<SummarizeArticleOutput> {
  return summarizeArticleFlow(input);
}

// The word limit is an instruction to the model only; longer answers are passed through as-is.
const summarizeArticlePrompt = ai.definePrompt({
  name: 'summarizeArticlePrompt',
  input: {schema: SummarizeArticleInputSchema},
  prompt: `Summarize the following article in exactly {{wordLimit}} words or less, maintaining key information:

{{{content}}}`,
});

const summarizeArticleFlow = ai.defineFlow(
  {
    name: 'summarizeArticleFlow',
    inputSchema: SummarizeArticleInputSchema,
    outputSchema: SummarizeArticleOutputSchema,
  },
  async input => {
    const response = await summarizeArticlePrompt(input);
    return {summary: response.text.trim()};
  }
);
