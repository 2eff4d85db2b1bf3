import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { OutgoingHttpHeader } from 'node:http';
import type { Express } from 'express';

export interface DispatchInit {
    method: string;
    path: string;
    body?: string;
    headers?: Record<string, string>;
}

export interface DispatchResult {
    status: number;
    header(name: string): OutgoingHttpHeader | undefined;
    body: unknown;
}

/**
 * Runs one request through a whole express app on real node:http message
 * objects. The socket is never connected; the response ends where express
 * calls `end`.
 */
export function dispatch(app: Express, init: DispatchInit): Promise<DispatchResult> {
    return new Promise((resolve, reject) => {
        const req = new IncomingMessage(new Socket());
        req.method = init.method;
        req.url = init.path;
        req.httpVersion = '1.1';
        req.httpVersionMajor = 1;
        req.httpVersionMinor = 1;
        req.headers = { ...init.headers };
        if (init.body !== undefined) {
            req.headers['content-length'] = String(Buffer.byteLength(init.body));
            req.push(init.body);
        }
        req.push(null);

        const res = new ServerResponse(req);
        Object.defineProperty(res, 'end', {
            value: (chunk?: unknown) => {
                const text = typeof chunk === 'string' ? chunk : Buffer.isBuffer(chunk) ? chunk.toString('utf8') : '';
                try {
                    resolve({
                        status: res.statusCode,
                        header: (name) => res.getHeader(name),
                        body: text.length > 0 ? JSON.parse(text) : undefined
                    });
                } catch (error) {
                    reject(error);
                }
                return res;
            }
        });

        app(req, res);
    });
}
