import { ReplyRepository } from '../database/ReplyRepository';
import { ReplyGenerator } from '../generator';
import {
  EmailReplyRecord,
  GeneratedReply,
  GenerationFailureError,
  InvalidArgumentError,
  NotFoundError,
  Result,
  ServiceError,
  StorageFailureError,
  err,
  errorMessage,
  isTone,
  ok,
} from '../models';

export interface ReplyService {
  /** False when running without a database; history operations are then unavailable. */
  readonly persistent: boolean;
  generateReply(emailText: string, tone: string): Promise<Result<GeneratedReply | EmailReplyRecord, ServiceError>>;
  listReplies(limit: number): Promise<Result<EmailReplyRecord[], ServiceError>>;
  getReply(id: number): Promise<Result<EmailReplyRecord, ServiceError>>;
}

export interface ReplyServiceConfig {
  generator: ReplyGenerator;
  /** Omit for stateless mode */
  repository?: ReplyRepository;
}

const PERSISTENCE_DISABLED = 'Reply history is not available: persistence is disabled';

export class ReplyServiceImpl implements ReplyService {
  private generator: ReplyGenerator;
  private repository?: ReplyRepository;

  constructor(config: ReplyServiceConfig) {
    this.generator = config.generator;
    this.repository = config.repository;
  }

  get persistent(): boolean {
    return this.repository !== undefined;
  }

  /**
   * Validate the tone, generate a reply and, when persistence is on, store the exchange.
   * Nothing is stored if generation fails.
   */
  async generateReply(
    emailText: string,
    tone: string
  ): Promise<Result<GeneratedReply | EmailReplyRecord, ServiceError>> {
    if (!isTone(tone)) {
      return err(new InvalidArgumentError("Tone must be 'formal' or 'casual'"));
    }

    let replyText: string;
    try {
      replyText = await this.generator.generateReply(emailText, tone);
    } catch (error) {
      console.error('Reply generation failed:', error);
      return err(new GenerationFailureError(`Error generating reply: ${errorMessage(error)}`, { cause: error }));
    }

    const reply: GeneratedReply = { emailText, tone, replyText };
    if (!this.repository) {
      return ok(reply);
    }

    try {
      return ok(await this.repository.create(reply));
    } catch (error) {
      console.error('Failed to save reply:', error);
      return err(new StorageFailureError(`Error saving reply: ${errorMessage(error)}`, { cause: error }));
    }
  }

  async listReplies(limit: number): Promise<Result<EmailReplyRecord[], ServiceError>> {
    if (!this.repository) {
      return err(new StorageFailureError(PERSISTENCE_DISABLED));
    }

    try {
      return ok(await this.repository.list(limit));
    } catch (error) {
      console.error('Failed to load reply history:', error);
      return err(new StorageFailureError(`Error loading history: ${errorMessage(error)}`, { cause: error }));
    }
  }

  async getReply(id: number): Promise<Result<EmailReplyRecord, ServiceError>> {
    if (!this.repository) {
      return err(new StorageFailureError(PERSISTENCE_DISABLED));
    }

    let record: EmailReplyRecord | null;
    try {
      record = await this.repository.getById(id);
    } catch (error) {
      console.error(`Failed to load reply ${id}:`, error);
      return err(new StorageFailureError(`Error loading reply: ${errorMessage(error)}`, { cause: error }));
    }

    if (!record) {
      return err(new NotFoundError(`Reply ${id} not found`));
    }

    return ok(record);
  }
}
