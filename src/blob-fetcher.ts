import axios, { AxiosInstance } from 'axios';
import { UpstreamFetchError, describeError } from './errors';
import { BlobFetcher, FetchedBlob } from './types';
import { hasSpreadsheetSignature } from './workbook-parser';

const SAMPLE_LENGTH = 200;

export class AxiosBlobFetcher implements BlobFetcher {
  private readonly client: AxiosInstance;

  constructor(timeoutMs: number) {
    this.client = axios.create({
      timeout: timeoutMs,
      responseType: 'arraybuffer',
      // status is checked by assertSpreadsheetPayload
      validateStatus: () => true,
      headers: { 'Cache-Control': 'no-cache' },
    });
  }

  async fetch(url: string): Promise<FetchedBlob> {
    try {
      const response = await this.client.get<ArrayBuffer>(url);
      return {
        status: response.status,
        contentType: String(response.headers['content-type'] ?? ''),
        body: Buffer.from(response.data),
      };
    } catch (error) {
      throw new UpstreamFetchError(`Spreadsheet download failed: ${describeError(error)}`);
    }
  }
}

/**
 * Sharing links answer with an HTML login or error page (often with status
 * 200) when the file is not public, so the body signature is what decides.
 */
export function assertSpreadsheetPayload(blob: FetchedBlob): void {
  const details = {
    status: blob.status,
    contentType: blob.contentType,
    sample: blob.body.subarray(0, SAMPLE_LENGTH).toString('utf8'),
  };

  if (blob.status < 200 || blob.status >= 300) {
    throw new UpstreamFetchError(`Spreadsheet download failed (${blob.status})`, details);
  }

  if (!hasSpreadsheetSignature(blob.body)) {
    throw new UpstreamFetchError(
      `Downloaded file is not a spreadsheet (content-type: ${blob.contentType || 'unknown'})`,
      details
    );
  }
}
