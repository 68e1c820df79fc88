/**
 * Document Processor Tests
 *
 * Run with: npx vitest run server/services/__tests__/documentProcessor.test.ts
 *
 * The vision client is replaced with an in-process fake; no requests
 * leave the test process.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  DocumentExtractor,
  MAX_IMAGE_SIZE,
  MIN_TEXT_LENGTH,
  OpenAIVisionRecognizer,
  detectImageMimeType,
  getImageMimeType,
  type TextRecognizer,
  type VisionCompletionClient,
} from '../documentProcessor';

const FORM_TEXT = [
  'Policy No: PN-AUTO-1001',
  'Claimant: Jane Doe',
  'Claim Amount: $500',
  'Rear ended at a red light, bumper damaged.',
].join('\n');

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff, 0xe0];

function fakeVisionClient(content: string | null) {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => ({
    choices: [{ message: { content } }],
  }));
  const client: VisionCompletionClient = { chat: { completions: { create } } };
  return { client, create };
}

function fixedRecognizer(text: string | null): TextRecognizer {
  return { recognize: vi.fn(async () => text) };
}

describe('DocumentProcessor', () => {
  let tempDir: string;
  let imagePath: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'claims-intake-test-'));
    imagePath = path.join(tempDir, 'claim.png');
    fs.writeFileSync(imagePath, Buffer.from(PNG_SIGNATURE));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('getImageMimeType', () => {
    it.each([
      ['scan.png', 'image/png'],
      ['scan.JPG', 'image/jpeg'],
      ['scan.jpeg', 'image/jpeg'],
      ['scan.gif', null],
      ['scan', null],
    ])('maps %s to %s', (file, expected) => {
      expect(getImageMimeType(file)).toBe(expected);
    });
  });

  describe('detectImageMimeType', () => {
    it('recognizes PNG and JPEG signatures', () => {
      expect(detectImageMimeType(Buffer.from(PNG_SIGNATURE))).toBe('image/png');
      expect(detectImageMimeType(Buffer.from(JPEG_SIGNATURE))).toBe('image/jpeg');
    });

    it('rejects other contents', () => {
      expect(detectImageMimeType(Buffer.from('GIF89a'))).toBeNull();
      expect(detectImageMimeType(Buffer.from([0x89, 0x50]))).toBeNull();
      expect(detectImageMimeType(Buffer.alloc(0))).toBeNull();
    });
  });

  describe('OpenAIVisionRecognizer', () => {
    it('sends the image as a data URL and returns the transcription', async () => {
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));
      const recognizer = new OpenAIVisionRecognizer(client, 'gpt-4o');

      const text = await recognizer.recognize(imagePath);

      expect(text).toBe(FORM_TEXT);
      expect(create).toHaveBeenCalledTimes(1);
      expect(create).toHaveBeenCalledWith(expect.objectContaining({
        model: 'gpt-4o',
        response_format: { type: 'json_object' },
      }));
      expect(JSON.stringify(create.mock.calls[0][0])).toContain('data:image/png;base64,iVBORw0KGgo=');
    });

    it('returns null for unsupported image types without calling the API', async () => {
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));
      const recognizer = new OpenAIVisionRecognizer(client);

      expect(await recognizer.recognize(path.join(tempDir, 'claim.gif'))).toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('uses the detected type for the data URL', async () => {
      const jpegPath = path.join(tempDir, 'claim.jpg');
      fs.writeFileSync(jpegPath, Buffer.from(JPEG_SIGNATURE));
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));

      await new OpenAIVisionRecognizer(client).recognize(jpegPath);

      expect(JSON.stringify(create.mock.calls[0][0])).toContain('data:image/jpeg;base64,/9j/4A==');
    });

    it('rejects files over the maximum size without calling the API', async () => {
      const largePath = path.join(tempDir, 'large.png');
      const contents = Buffer.alloc(MAX_IMAGE_SIZE + 1, 0x41);
      Buffer.from(PNG_SIGNATURE).copy(contents);
      fs.writeFileSync(largePath, contents);
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));

      expect(await new OpenAIVisionRecognizer(client).recognize(largePath)).toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('accepts a file of exactly the maximum size', async () => {
      const limitPath = path.join(tempDir, 'limit.png');
      const contents = Buffer.alloc(MAX_IMAGE_SIZE, 0x41);
      Buffer.from(PNG_SIGNATURE).copy(contents);
      fs.writeFileSync(limitPath, contents);
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));

      expect(await new OpenAIVisionRecognizer(client).recognize(limitPath)).toBe(FORM_TEXT);
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('rejects a file whose contents do not match its image extension', async () => {
      const mislabelledPath = path.join(tempDir, 'notes.png');
      fs.writeFileSync(mislabelledPath, 'Policy No: PN-AUTO-1001, this is plain text');
      const { client, create } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));

      expect(await new OpenAIVisionRecognizer(client).recognize(mislabelledPath)).toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('returns null for an empty response', async () => {
      const { client } = fakeVisionClient(null);
      expect(await new OpenAIVisionRecognizer(client).recognize(imagePath)).toBeNull();
    });

    it('returns null when the response has the wrong shape', async () => {
      const { client } = fakeVisionClient(JSON.stringify({ transcript: FORM_TEXT }));
      expect(await new OpenAIVisionRecognizer(client).recognize(imagePath)).toBeNull();
    });
  });

  describe('DocumentExtractor', () => {
    it('extracts entities from raw text', async () => {
      const extractor = new DocumentExtractor(null);

      const output = await extractor.extract({ kind: 'text', text: FORM_TEXT });

      expect(output).toEqual({
        text: FORM_TEXT,
        entities: {
          personNames: ['Jane Doe'],
          dates: [],
          policyNumber: 'PN-AUTO-1001',
          claimValue: 500,
        },
      });
    });

    it('extracts entities from a recognized image', async () => {
      const recognizer = fixedRecognizer(FORM_TEXT);
      const extractor = new DocumentExtractor(recognizer);

      const output = await extractor.extract({ kind: 'image', imagePath });

      expect(recognizer.recognize).toHaveBeenCalledWith(imagePath);
      expect(output?.entities.policyNumber).toBe('PN-AUTO-1001');
    });

    it('treats text shorter than the minimum length as blank', async () => {
      const extractor = new DocumentExtractor(null);
      const text = 'x'.repeat(MIN_TEXT_LENGTH - 1);

      expect(await extractor.extract({ kind: 'text', text })).toBeNull();
      expect(await extractor.extract({ kind: 'text', text: ' '.repeat(80) })).toBeNull();
    });

    it('measures the length after trimming surrounding whitespace', async () => {
      const extractor = new DocumentExtractor(null);

      expect(await extractor.extract({ kind: 'text', text: `${' '.repeat(60)}Claim ab` })).toBeNull();
      expect(await extractor.extract({ kind: 'text', text: `\n\n${'z'.repeat(MIN_TEXT_LENGTH - 1)}\t\t` })).toBeNull();
    });

    it('accepts text of exactly the minimum length', async () => {
      const extractor = new DocumentExtractor(null);
      const output = await extractor.extract({ kind: 'text', text: 'y'.repeat(MIN_TEXT_LENGTH) });

      expect(output?.text).toHaveLength(MIN_TEXT_LENGTH);
    });

    it('fails image sources when no recognizer is configured', async () => {
      const extractor = new DocumentExtractor(null);
      expect(await extractor.extract({ kind: 'image', imagePath })).toBeNull();
    });

    it('fails when the recognizer finds nothing', async () => {
      const extractor = new DocumentExtractor(fixedRecognizer(null));
      expect(await extractor.extract({ kind: 'image', imagePath })).toBeNull();
    });

    it('does not let recognizer errors escape', async () => {
      const recognizer: TextRecognizer = {
        recognize: vi.fn(async () => {
          throw new Error('file not found');
        }),
      };
      const extractor = new DocumentExtractor(recognizer);

      await expect(extractor.extract({ kind: 'image', imagePath: '/missing/claim.png' })).resolves.toBeNull();
    });

    it('does not let unreadable files escape through the vision recognizer', async () => {
      const { client } = fakeVisionClient(JSON.stringify({ text: FORM_TEXT }));
      const extractor = new DocumentExtractor(new OpenAIVisionRecognizer(client));

      await expect(
        extractor.extract({ kind: 'image', imagePath: path.join(tempDir, 'missing.png') })
      ).resolves.toBeNull();
    });
  });
});
