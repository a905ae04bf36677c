/**
 * Plain HTTP text fetching with a bounded timeout
 */

export interface FetchTextOptions {
    headers?: Record<string, string>;
    timeoutMs: number;
}

export async function fetchText(url: string, options: FetchTextOptions): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: options.headers,
        });

        if (!response.ok) {
            throw new Error(`Request failed (status ${response.status})`);
        }

        return await response.text();
    } finally {
        clearTimeout(timeoutId);
    }
}
