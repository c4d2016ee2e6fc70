import { GoogleGenAI } from '@google/genai';
import { TextGenerationClient } from './ReplyGenerator';

export class GeminiClient implements TextGenerationClient {
  private ai: GoogleGenAI;

  constructor(apiKey: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async generate(model: string, prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model,
      contents: prompt,
    });

    const text = response.text;
    if (text === undefined) {
      throw new Error('Gemini returned no text');
    }

    return text;
  }
}
