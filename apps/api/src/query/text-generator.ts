import OpenAI from 'openai';
import type { TranslatorConfig } from '../config';

export const TEXT_GENERATOR = Symbol('TEXT_GENERATOR');

export type ChatPrompt = {
  system: string;
  user: string;
};

/** Text-in/text-out access to a language model; resolves to the first reply or null. */
export interface TextGenerator {
  complete(prompt: ChatPrompt): Promise<string | null>;
}

export class OpenAiTextGenerator implements TextGenerator {
  private readonly openai: OpenAI;

  constructor(private readonly config: TranslatorConfig) {
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
    });
  }

  async complete(prompt: ChatPrompt): Promise<string | null> {
    const response = await this.openai.chat.completions.create({
      model: this.config.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      temperature: 0.1,
    });
    return response.choices[0]?.message?.content ?? null;
  }
}
