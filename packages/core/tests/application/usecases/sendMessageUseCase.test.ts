import { beforeEach, describe, expect, it } from 'vitest';
import {
  type SendMessageInput,
  SendMessageUseCase,
} from '@/application/usecases/sendMessageUseCase';
import {
  AttachmentNotFoundError,
  InvalidHeaderError,
  NoRecipientsError,
  SendFailedError,
} from '@/domain/errors';
import {
  createRecordingTransport,
  MemoryFileSystem,
  sequentialBoundary,
} from '../../helpers/fakes';

describe('SendMessageUseCase', () => {
  let useCase: SendMessageUseCase;
  let transport: ReturnType<typeof createRecordingTransport>;
  let fileSystem: MemoryFileSystem;

  const validInput: SendMessageInput = {
    from: { address: 'sender@example.com', name: 'Sender' },
    to: [{ address: 'recipient@example.com', name: 'Recipient' }],
    subject: 'Test Email',
    body: 'This is a test email.',
  };

  beforeEach(() => {
    transport = createRecordingTransport();
    fileSystem = new MemoryFileSystem({
      '/tmp/invoice.pdf': {
        content: Buffer.from('invoice'),
        mimeType: 'application/pdf',
      },
    });
    useCase = new SendMessageUseCase(transport, fileSystem, {
      boundary: sequentialBoundary(),
    });
  });

  describe('execute', () => {
    it('should send message successfully', async () => {
      const result = await useCase.execute(validInput);

      expect(result).toEqual({
        recipients: '"Recipient" <recipient@example.com>',
        attachmentCount: 0,
      });
      expect(transport.send).toHaveBeenCalledOnce();
      expect(transport.send).toHaveBeenCalledWith({
        recipients: '"Recipient" <recipient@example.com>',
        subject: 'Test Email',
        body: 'This is a test email.',
        headers: 'From: "Sender" <sender@example.com>',
      });
    });

    it('should apply every optional field', async () => {
      await useCase.execute({
        ...validInput,
        cc: [{ address: 'cc@example.com' }],
        bcc: [{ address: 'bcc@example.com' }],
        sender: { address: 'agent@example.com' },
        replyTo: { address: 'reply@example.com' },
        contentType: { type: 'text/html', charset: 'utf-8' },
        headers: [{ name: 'X-Campaign', value: 'spring' }],
      });

      expect(transport.sent[0]?.headers.split('\r\n')).toEqual([
        'MIME-Version: 1.0',
        'Content-type:text/html; charset="utf-8"',
        'From: "Sender" <sender@example.com>',
        'Sender: agent@example.com',
        'Reply-To: reply@example.com',
        'Cc: cc@example.com',
        'Bcc: bcc@example.com',
        'X-Campaign: spring',
      ]);
    });

    it('should attach files', async () => {
      const result = await useCase.execute({
        ...validInput,
        attachments: ['/tmp/invoice.pdf'],
      });

      expect(result.attachmentCount).toBe(1);
      expect(transport.sent[0]?.body).toContain(
        '--boundary-1\r\nContent-Type: application/pdf; name="invoice.pdf"\r\n',
      );
    });

    it('should throw NoRecipientsError if to is empty', async () => {
      await expect(useCase.execute({ ...validInput, to: [] })).rejects.toThrow(
        NoRecipientsError,
      );
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should throw AttachmentNotFoundError before sending', async () => {
      await expect(
        useCase.execute({ ...validInput, attachments: ['/tmp/missing.pdf'] }),
      ).rejects.toThrow(AttachmentNotFoundError);
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should reject addresses that would inject headers', async () => {
      await expect(
        useCase.execute({
          ...validInput,
          cc: [{ address: 'cc@example.com\r\nBcc: evil@example.com' }],
        }),
      ).rejects.toThrow(InvalidHeaderError);
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('should throw SendFailedError if the transport fails', async () => {
      const failing = new SendMessageUseCase(
        createRecordingTransport(false),
        fileSystem,
      );

      await expect(failing.execute(validInput)).rejects.toThrow(
        SendFailedError,
      );
    });
  });
});
