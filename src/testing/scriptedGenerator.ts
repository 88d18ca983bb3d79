import type { GenerationOptions, PromptMessage, TextGenerator } from '../services/textGenerator';

/** Replays queued completions; an Error in the queue is thrown instead. */
export class ScriptedGenerator implements TextGenerator {
  readonly calls: Array<{ messages: PromptMessage[]; options?: GenerationOptions }> = [];

  constructor(private readonly replies: Array<string | null | Error> = []) {}

  async complete(messages: PromptMessage[], options?: GenerationOptions): Promise<string | null> {
    this.calls.push({ messages, options });
    const next = this.replies.shift();
    if (next === undefined) throw new Error('No scripted completion left');
    if (next instanceof Error) throw next;
    return next;
  }
}
