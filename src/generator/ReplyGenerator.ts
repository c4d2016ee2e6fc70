import { Tone } from '../models';
import { buildReplyPrompt } from './prompt';

/**
 * A text-generation backend. Failures surface as rejected promises.
 */
export interface TextGenerationClient {
  generate(model: string, prompt: string): Promise<string>;
}

export class ReplyGenerator {
  constructor(
    private client: TextGenerationClient,
    readonly model: string
  ) {}

  generateReply(emailText: string, tone: Tone): Promise<string> {
    return this.client.generate(this.model, buildReplyPrompt(emailText, tone));
  }
}
