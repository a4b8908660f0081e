/**
 * HTTP archive transport backed by axios
 */

import axios, { AxiosInstance } from 'axios';
import { FetchError } from '../errors';
import type { ArchiveFetcher, FetchedArchive } from './types';

export class HttpArchiveFetcher implements ArchiveFetcher {
    constructor(
        private readonly timeoutMs: number,
        private readonly client: Pick<AxiosInstance, 'get'> = axios
    ) {}

    async fetch(url: string): Promise<FetchedArchive> {
        try {
            const response = await this.client.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                timeout: this.timeoutMs,
                maxRedirects: 5,
                // status handling belongs to the caller
                validateStatus: () => true,
            });

            return {
                status: response.status,
                ok: response.status >= 200 && response.status < 300,
                data: Buffer.from(response.data),
            };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Archive request failed: ${reason}`, 0, { url }, error);
        }
    }
}
