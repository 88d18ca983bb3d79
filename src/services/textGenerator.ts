import Groq from 'groq-sdk';

export interface PromptMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
}

/** Generative text backend. Returns null when the model produced nothing. */
export interface TextGenerator {
  complete(messages: PromptMessage[], options?: GenerationOptions): Promise<string | null>;
}

export class GroqTextGenerator implements TextGenerator {
  private groq: Groq;

  constructor(apiKey: string, private readonly model: string) {
    this.groq = new Groq({ apiKey });
  }

  async complete(messages: PromptMessage[], options: GenerationOptions = {}): Promise<string | null> {
    const response = await this.groq.chat.completions.create({
      model: this.model,
      messages,
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? 500,
    });

    const content = response.choices[0]?.message?.content?.trim();
    return content ? content : null;
  }
}
