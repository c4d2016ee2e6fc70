import { Database } from './connection';
import { EmailReplyRecord, NewEmailReply, isTone } from '../models';

interface EmailReplyRow {
  id: number;
  email_text: string;
  tone: string;
  reply_text: string;
  // Parsed by the driver. Tables from earlier deployments allow NULL here.
  created_at: Date | string | null;
}

const COLUMNS = 'id, email_text, tone, reply_text, created_at';

// SERIAL is a 32-bit integer
const MAX_SERIAL_ID = 2147483647;

export class ReplyRepository {
  constructor(private db: Database) {}

  /**
   * Inserts the reply in its own transaction and returns the stored row,
   * including the id and timestamp the store assigned.
   */
  async create(reply: NewEmailReply): Promise<EmailReplyRecord> {
    return this.db.transaction(async (session) => {
      const row = await session.get<EmailReplyRow>(
        `INSERT INTO email_replies (email_text, tone, reply_text, created_at)
         VALUES (?, ?, ?, NOW())
         RETURNING ${COLUMNS}`,
        [reply.emailText, reply.tone, reply.replyText]
      );

      if (!row) {
        throw new Error('Insert into email_replies returned no row');
      }

      return this.mapRowToRecord(row);
    });
  }

  async getById(id: number): Promise<EmailReplyRecord | null> {
    // Out of range for the column, so it cannot exist; querying would fail instead
    if (Math.abs(id) > MAX_SERIAL_ID) return null;

    const row = await this.db.get<EmailReplyRow>(
      `SELECT ${COLUMNS} FROM email_replies WHERE id = ?`,
      [id]
    );

    if (!row) return null;

    return this.mapRowToRecord(row);
  }

  async list(limit: number): Promise<EmailReplyRecord[]> {
    const rows = await this.db.all<EmailReplyRow>(
      `SELECT ${COLUMNS} FROM email_replies ORDER BY created_at DESC, id DESC LIMIT ?`,
      [limit]
    );

    return rows.map(row => this.mapRowToRecord(row));
  }

  private mapRowToRecord(row: EmailReplyRow): EmailReplyRecord {
    if (!isTone(row.tone)) {
      throw new Error(`email_replies row ${row.id} has unrecognized tone '${row.tone}'`);
    }

    if (row.created_at === null) {
      throw new Error(`email_replies row ${row.id} has no created_at`);
    }

    return {
      id: Number(row.id),
      emailText: row.email_text,
      tone: row.tone,
      replyText: row.reply_text,
      createdAt: new Date(row.created_at),
    };
  }
}
