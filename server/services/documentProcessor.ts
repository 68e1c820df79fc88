/**
 * Document Processing Service
 *
 * Turns a scanned claim form into raw text and extracted entities.
 *
 * - Text recognition: OpenAI Vision reads the form image
 * - Entity extraction: labelled-field parsing of the recognized text
 *
 * Nothing thrown here crosses into the pipeline: unreadable, blank or
 * unsupported documents produce a null result.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ClaimSource, ExtractionOutput } from '../../shared/types';
import { loggers, logError } from '../lib/logger';
import { extractEntities } from './entityExtractor';

const log = loggers.documents;

// Shorter text means the scan was blank or unreadable
export const MIN_TEXT_LENGTH = 50;

export const MAX_IMAGE_SIZE = 5 * 1024 * 1024; // 5MB

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

// ============================================
// TEXT RECOGNITION
// ============================================

export interface TextRecognizer {
  /** Raw text of the document image, or null when nothing could be read */
  recognize(imagePath: string): Promise<string | null>;
}

/**
 * The part of the OpenAI client used for vision requests
 */
export interface VisionCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

const OCR_SYSTEM_PROMPT = `You are a document transcription engine for insurance claim forms.
Transcribe ALL text visible in the image exactly as written, preserving line breaks and the order of fields.
Do not summarize, correct, translate or add anything.

Respond with a JSON object:
{
  "text": "<full transcription, or an empty string if the image is blank or unreadable>"
}`;

const transcriptionSchema = z.object({
  text: z.string(),
});

// Leading bytes of each accepted image format
const IMAGE_SIGNATURES: Array<{ mimeType: string; bytes: number[] }> = [
  { mimeType: 'image/png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { mimeType: 'image/jpeg', bytes: [0xff, 0xd8, 0xff] },
];

export function getImageMimeType(imagePath: string): string | null {
  return IMAGE_MIME_TYPES[path.extname(imagePath).toLowerCase()] ?? null;
}

/**
 * Image type from the file contents, or null when the bytes are not a
 * PNG or JPEG
 */
export function detectImageMimeType(buffer: Buffer): string | null {
  const match = IMAGE_SIGNATURES.find(({ bytes }) =>
    buffer.length >= bytes.length && bytes.every((byte, index) => buffer[index] === byte)
  );
  return match?.mimeType ?? null;
}

export class OpenAIVisionRecognizer implements TextRecognizer {
  constructor(
    private readonly client: VisionCompletionClient,
    private readonly model: string = 'gpt-4o'
  ) {}

  async recognize(imagePath: string): Promise<string | null> {
    if (!getImageMimeType(imagePath)) {
      log.warn({ imagePath }, 'Unsupported image type');
      return null;
    }

    const stats = await fs.promises.stat(imagePath);
    if (stats.size > MAX_IMAGE_SIZE) {
      log.warn({ imagePath, size: stats.size, maxSize: MAX_IMAGE_SIZE }, 'Image exceeds the maximum file size');
      return null;
    }

    const buffer = await fs.promises.readFile(imagePath);
    const mimeType = detectImageMimeType(buffer);
    if (!mimeType) {
      log.warn({ imagePath }, 'File contents are not a PNG or JPEG image');
      return null;
    }

    const base64 = buffer.toString('base64');

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'system',
          content: OCR_SYSTEM_PROMPT,
        },
        {
          role: 'user',
          content: [
            {
              type: 'image_url',
              image_url: {
                url: `data:${mimeType};base64,${base64}`,
                detail: 'high',
              },
            },
            {
              type: 'text',
              text: 'Transcribe this claim form. Return ONLY valid JSON.',
            },
          ],
        },
      ],
      max_tokens: 4000,
      response_format: { type: 'json_object' },
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      return null;
    }

    const parsed = transcriptionSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      log.warn({ imagePath }, 'Transcription response did not match the expected shape');
      return null;
    }

    return parsed.data.text;
  }
}

// ============================================
// EXTRACTION
// ============================================

export class DocumentExtractor {
  /**
   * @param recognizer - null when no recognition backend is configured;
   *   image sources then always fail extraction
   */
  constructor(private readonly recognizer: TextRecognizer | null) {}

  async extract(source: ClaimSource): Promise<ExtractionOutput | null> {
    const text = source.kind === 'text'
      ? source.text
      : await this.recognizeImage(source.imagePath);

    if (!text || text.trim().length < MIN_TEXT_LENGTH) {
      log.warn(
        { source: source.kind, length: text?.length ?? 0 },
        'Insufficient text. The document might be blank or unreadable.'
      );
      return null;
    }

    const entities = extractEntities(text);
    log.info(
      {
        policyNumber: entities.policyNumber,
        claimValue: entities.claimValue,
        personNames: entities.personNames.length,
        dates: entities.dates.length,
      },
      'Extracted entities'
    );

    return { entities, text };
  }

  private async recognizeImage(imagePath: string): Promise<string | null> {
    log.info({ imagePath }, 'Starting document processing');

    if (!this.recognizer) {
      log.warn({ imagePath }, 'No text recognizer configured');
      return null;
    }

    try {
      return await this.recognizer.recognize(imagePath);
    } catch (error) {
      logError(log, error, 'Text recognition failed', { imagePath });
      return null;
    }
  }
}
