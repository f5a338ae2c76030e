import { Account, Keypair, MuxedAccount } from '@stellar/stellar-sdk';
import sharp from 'sharp';

export interface FormPart {
  name: string;
  value: string | Buffer;
  filename?: string;
  contentType?: string;
}

/**
 * Encodes parts the way browsers and HTTP clients do, with CRLF line breaks.
 */
export function multipartBody(boundary: string, parts: FormPart[]): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let head = `--${boundary}\r\nContent-Disposition: form-data; name="${part.name}"`;
    if (part.filename !== undefined) {
      head += `; filename="${part.filename}"`;
    }
    head += '\r\n';
    if (part.contentType !== undefined) {
      head += `Content-Type: ${part.contentType}\r\n`;
    }
    head += '\r\n';
    const value = typeof part.value === 'string' ? Buffer.from(part.value, 'utf8') : part.value;
    chunks.push(Buffer.from(head, 'utf8'), value, Buffer.from('\r\n', 'utf8'));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`, 'utf8'));
  return Buffer.concat(chunks);
}

export function pngImage(): Promise<Buffer> {
  return sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 200, g: 20, b: 20 } } })
    .png()
    .toBuffer();
}

export function jpegImage(): Promise<Buffer> {
  return sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 20, g: 20, b: 200 } } })
    .jpeg()
    .toBuffer();
}

export function randomAccountId(): string {
  return Keypair.random().publicKey();
}

export function muxedAddress(accountId: string, id: string): string {
  return new MuxedAccount(new Account(accountId, '0'), id).accountId();
}
