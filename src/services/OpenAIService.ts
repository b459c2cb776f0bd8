// MARK: - OpenAI Service
// Chat completion backend for journal insights

import OpenAI from 'openai';
import { logger } from '../utils/logger';

export interface GeneratedText {
  text: string;
  tokensUsed: {
    input: number;
    output: number;
  };
}

export interface InsightGenerator {
  generate(systemPrompt: string, userPrompt: string): Promise<GeneratedText>;
}

export class OpenAIService implements InsightGenerator {
  private readonly openai: OpenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.openai = new OpenAI({ apiKey });
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<GeneratedText> {
    const completion = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      max_tokens: 1200,
      temperature: 0.7,
    });

    const text = completion.choices[0]?.message?.content || 'No response generated.';
    const tokensUsed = {
      input: completion.usage?.prompt_tokens || 0,
      output: completion.usage?.completion_tokens || 0,
    };

    logger.info('Insight generated', { model: this.model, ...tokensUsed });

    return { text, tokensUsed };
  }
}
