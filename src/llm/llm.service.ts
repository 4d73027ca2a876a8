import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatTurn, LanguageModel, OutputSchema, Prompt } from '../common/collaborators';

const REQUEST_TIMEOUT_MS = 30000;

/**
 * OpenAI-backed language model. Structured calls ask for a strict JSON
 * schema first and fall back to plain JSON mode for models that reject it.
 */
@Injectable()
export class LlmService implements LanguageModel {
  private readonly logger = new Logger(LlmService.name);
  private readonly openai?: OpenAI;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    this.model = this.configService.get<string>('OPENAI_MODEL') ?? 'gpt-4o-mini';

    if (!apiKey) {
      this.logger.warn('OPENAI_API_KEY is not configured; classification will fall back to "other"');
      return;
    }

    this.openai = new OpenAI({ apiKey, timeout: REQUEST_TIMEOUT_MS, maxRetries: 0 });
    this.logger.log(`Using model ${this.model}`);
  }

  async complete(prompt: Prompt, schema: OutputSchema): Promise<unknown> {
    const client = this.client();
    const messages = toMessages(prompt);
    const startTime = Date.now();

    let content: string | null | undefined;
    try {
      const completion = await client.chat.completions.create({
        model: this.model,
        messages,
        temperature: prompt.temperature ?? 0,
        response_format: {
          type: 'json_schema',
          json_schema: { name: schema.name, schema: schema.jsonSchema, strict: true },
        },
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      if (!(error instanceof OpenAI.BadRequestError)) {
        throw error;
      }

      this.logger.warn(`Model ${this.model} rejected json_schema output, retrying in JSON mode`);
      const completion = await client.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'system',
            content: `${prompt.system}\n\nReply with one JSON object matching this schema:\n${JSON.stringify(schema.jsonSchema)}`,
          },
          ...messages.slice(1),
        ],
        temperature: prompt.temperature ?? 0,
        response_format: { type: 'json_object' },
      });
      content = completion.choices[0]?.message?.content;
    }

    this.logger.debug(`OpenAI responded in ${Date.now() - startTime}ms`);

    if (!content) {
      throw new Error('No response from OpenAI');
    }
    return JSON.parse(content);
  }

  async reply(prompt: Prompt): Promise<string> {
    const completion = await this.client().chat.completions.create({
      model: this.model,
      messages: toMessages(prompt),
      temperature: prompt.temperature ?? 0.3,
    });

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }
    return content;
  }

  private client(): OpenAI {
    if (!this.openai) {
      throw new Error('OPENAI_API_KEY is required');
    }
    return this.openai;
  }
}

function toMessages(prompt: Prompt): ChatCompletionMessageParam[] {
  return [{ role: 'system', content: prompt.system }, ...prompt.turns.map(toMessage)];
}

function toMessage(turn: ChatTurn): ChatCompletionMessageParam {
  return turn.role === 'user'
    ? { role: 'user', content: turn.content }
    : { role: 'assistant', content: turn.content };
}
