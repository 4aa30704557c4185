import { InputFile } from 'grammy';
import { debugLog } from '../utils/debug-log.js';
import { getErrorMessage } from '../utils/errors.js';

/**
 * Where a delivery reports to: one status message that is edited in place,
 * plus file uploads.
 */
export interface ReplySink {
  begin(text: string): Promise<void>;
  update(text: string): Promise<void>;
  sendFile(filePath: string, fileName: string): Promise<void>;
}

/** The subset of grammY's `Api` the sink talks to. */
export interface TelegramTransport {
  sendMessage(
    chatId: number,
    text: string,
    other?: { reply_parameters?: { message_id: number } }
  ): Promise<{ message_id: number }>;
  editMessageText(chatId: number, messageId: number, text: string): Promise<unknown>;
  sendDocument(chatId: number, document: InputFile): Promise<unknown>;
  sendChatAction(chatId: number, action: 'upload_document'): Promise<unknown>;
}

export class TelegramReplySink implements ReplySink {
  private statusMessageId: number | null = null;

  constructor(
    private readonly api: TelegramTransport,
    private readonly chatId: number,
    private readonly replyToMessageId?: number
  ) {}

  async begin(text: string): Promise<void> {
    const other = this.replyToMessageId !== undefined
      ? { reply_parameters: { message_id: this.replyToMessageId } }
      : undefined;
    const message = await this.api.sendMessage(this.chatId, text, other);
    this.statusMessageId = message.message_id;
  }

  async update(text: string): Promise<void> {
    if (this.statusMessageId === null) {
      await this.begin(text);
      return;
    }
    await this.api.editMessageText(this.chatId, this.statusMessageId, text);
  }

  async sendFile(filePath: string, fileName: string): Promise<void> {
    try {
      await this.api.sendChatAction(this.chatId, 'upload_document');
    } catch (e) {
      debugLog(`[sink] Failed to send chat action: ${getErrorMessage(e)}`);
    }
    await this.api.sendDocument(this.chatId, new InputFile(filePath, fileName));
  }
}
