/**
 * DetectX inference client
 *
 * Speaks the service's HTTP protocol under /local/detectx:
 * - GET  /capabilities, /health, /monitor-latest
 * - POST /inference-jpeg   (image/jpeg)
 * - POST /inference-tensor (application/octet-stream, H x W x 3 uint8)
 *
 * Inference responses are status driven: 200 carries detections, 204 means
 * none were found and 503 means the service queue is full (ServiceBusyError).
 */
import http from 'http';
import https from 'https';
import AxiosDigestAuth from '@mhoc/axios-digest-auth';
import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';
import {
  ConnectionError,
  DecodeError,
  InvalidInputError,
  ServiceBusyError,
  ServiceError,
} from './errors';
import { type ImageInput, toJpegPayload } from './preprocess';
import type {
  Detection,
  LatestInference,
  PixelTensor,
  ServiceCapabilities,
  ServiceHealth,
} from './types';

// ============================================
// Schemas
// ============================================

const BBoxPixelsSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  w: z.number().int(),
  h: z.number().int(),
});

// The service has shipped both {cx, cy, w, h} and {x, y, w, h} (center) layouts
const BBoxYoloSchema = z.union([
  z.object({ cx: z.number(), cy: z.number(), w: z.number(), h: z.number() }),
  z
    .object({ x: z.number(), y: z.number(), w: z.number(), h: z.number() })
    .transform(({ x, y, w, h }) => ({ cx: x, cy: y, w, h })),
]);

const DetectionSchema = z.object({
  index: z.number().int().optional(),
  label: z.string(),
  class_id: z.number().int(),
  confidence: z.number().min(0).max(1),
  bbox_pixels: BBoxPixelsSchema,
  bbox_yolo: BBoxYoloSchema,
});

const InferenceResponseSchema = z.object({
  detections: z.array(DetectionSchema),
});

const CapabilitiesSchema = z.object({
  model: z.object({
    input_width: z.number().int().positive(),
    input_height: z.number().int().positive(),
    channels: z.number().int().optional(),
    aspect_ratio: z.string().optional(),
    classes: z.array(z.object({ id: z.number().int(), name: z.string() })),
    input_formats: z.array(
      z.object({
        endpoint: z.string(),
        method: z.string().optional(),
        content_type: z.string().optional(),
        description: z.string().optional(),
      })
    ),
    max_queue_size: z.number().int().optional(),
  }),
  server: z.string().optional(),
  version: z.string().optional(),
});

const HealthSchema = z.object({
  running: z.boolean(),
  queue_size: z.number(),
  queue_full: z.boolean().optional(),
  statistics: z.object({
    total_requests: z.number(),
    successful: z.number().optional(),
    failed: z.number().optional(),
    busy: z.number().optional(),
  }),
  timing: z
    .object({
      average_ms: z.number(),
      min_ms: z.number(),
      max_ms: z.number(),
    })
    .optional(),
});

const LatestSchema = z.object({
  image: z.string(),
  detections: z.array(DetectionSchema),
  timestamp: z.number(),
});

type WireDetection = z.infer<typeof DetectionSchema>;

// ============================================
// Types
// ============================================

export type InferenceClientConfig = {
  /** Camera IP/hostname, or a full origin such as http://host:8080 */
  host: string;
  username?: string;
  password?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Pre-built axios instance; the client then owns no connections */
  transport?: AxiosInstance;
  debug?: boolean;
};

type SendOptions = {
  body?: Buffer;
  contentType?: string;
  index?: number;
};

export const BASE_PATH = '/local/detectx';
export const DEFAULT_TIMEOUT_MS = 30000;

// ============================================
// Client
// ============================================

export class InferenceClient {
  readonly baseUrl: string;
  private http: AxiosInstance;
  private agent: http.Agent | null = null;
  private digest: AxiosDigestAuth | null = null;
  private timeoutMs: number;
  private debug: boolean;
  private closed = false;

  constructor(config: InferenceClientConfig) {
    const origin = /^https?:\/\//i.test(config.host)
      ? config.host.replace(/\/+$/, '')
      : `http://${config.host}`;
    this.baseUrl = `${origin}${BASE_PATH}`;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = config.debug ?? false;

    if (config.transport) {
      this.http = config.transport;
    } else {
      // One keep-alive agent shared by every worker of a run; close() releases it
      const isHttps = origin.toLowerCase().startsWith('https://');
      this.agent = isHttps
        ? new https.Agent({ keepAlive: true })
        : new http.Agent({ keepAlive: true });
      this.http = axios.create(
        isHttps ? { httpsAgent: this.agent } : { httpAgent: this.agent }
      );
    }

    if (config.username && config.password) {
      this.digest = new AxiosDigestAuth({
        axios: this.http,
        username: config.username,
        password: config.password,
      });
    }
  }

  /**
   * Get server capabilities and model information
   */
  async getCapabilities(): Promise<ServiceCapabilities> {
    const response = await this.send('GET', '/capabilities');
    this.assertOk(response);
    return decode(CapabilitiesSchema, response.data, 'capabilities');
  }

  /**
   * Get server health and statistics
   */
  async getHealth(): Promise<ServiceHealth> {
    const response = await this.send('GET', '/health');
    this.assertOk(response);
    return decode(HealthSchema, response.data, 'health');
  }

  /**
   * Most recent inference the service ran, or null if it has not run one yet
   */
  async getLatest(): Promise<LatestInference | null> {
    const response = await this.send('GET', '/monitor-latest');
    if (response.status === 404) return null;
    this.assertOk(response);
    const latest = decode(LatestSchema, response.data, 'monitor-latest');
    return {
      image: latest.image,
      timestamp: latest.timestamp,
      detections: latest.detections.map((d) => toDetection(d, -1)),
    };
  }

  /**
   * Run inference on an encoded image. Non-JPEG input is converted first.
   */
  async inferJpeg(image: ImageInput, index = -1): Promise<Detection[]> {
    const body = await toJpegPayload(image);
    const response = await this.send('POST', '/inference-jpeg', {
      body,
      contentType: 'image/jpeg',
      index,
    });
    return this.readDetections(response, index);
  }

  /**
   * Run inference on a preprocessed [height, width, 3] uint8 tensor.
   * The dimensions must match the model input (see getCapabilities).
   */
  async inferTensor(tensor: PixelTensor, index = -1): Promise<Detection[]> {
    validateTensor(tensor);
    const { data } = tensor;
    const body = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const response = await this.send('POST', '/inference-tensor', {
      body,
      contentType: 'application/octet-stream',
      index,
    });
    return this.readDetections(response, index);
  }

  /**
   * Release pooled connections. Later calls fail with ConnectionError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.agent?.destroy();
    this.agent = null;
  }

  // ============================================
  // Private Methods
  // ============================================

  private readDetections(response: AxiosResponse<unknown>, index: number): Detection[] {
    const { status } = response;
    if (status === 204) return [];
    if (status === 503) {
      this.log(`Busy (503) for index ${index}`);
      throw new ServiceBusyError();
    }
    this.assertOk(response);
    const decoded = decode(InferenceResponseSchema, response.data, 'inference');
    return decoded.detections.map((d) => toDetection(d, index));
  }

  private assertOk(response: AxiosResponse<unknown>): void {
    if (response.status >= 200 && response.status < 300) return;
    const body = bodyText(response.data);
    const url = response.config.url ?? '';
    throw new ServiceError(
      `Request to ${url.replace(this.baseUrl, '')} failed with status ${response.status}` +
        (body ? `: ${body.slice(0, 200)}` : ''),
      response.status,
      body
    );
  }

  private async send(
    method: 'GET' | 'POST',
    endpoint: string,
    options: SendOptions = {}
  ): Promise<AxiosResponse<unknown>> {
    let url = `${this.baseUrl}${endpoint}`;
    if (options.index !== undefined && options.index >= 0) {
      url += `?index=${options.index}`;
    }

    const headers: Record<string, string> = {};
    if (options.contentType) headers['Content-Type'] = options.contentType;

    const request: AxiosRequestConfig = {
      method,
      url,
      data: options.body,
      headers,
      timeout: this.timeoutMs,
      maxBodyLength: Infinity,
      validateStatus: () => true,
    };

    const { digest } = this;
    if (!digest) {
      return this.dispatch(() => this.http.request<unknown>(request));
    }

    // The digest wrapper answers a challenge only when the 401 is thrown
    this.log(`${method} ${endpoint} with digest auth`);
    return this.dispatch(() =>
      digest.request({ ...request, validateStatus: (status) => status !== 401 })
    );
  }

  private async dispatch(
    run: () => Promise<AxiosResponse<unknown>>
  ): Promise<AxiosResponse<unknown>> {
    if (this.closed) {
      throw new ConnectionError('Client is closed');
    }
    try {
      return await run();
    } catch (error) {
      // A rejected challenge still carries a response for the status mapping
      if (axios.isAxiosError(error) && error.response) {
        return error.response;
      }
      throw toTransportError(error);
    }
  }

  private log(message: string) {
    if (this.debug) {
      console.log(`[Client] ${message}`);
    }
  }
}

// ============================================
// Helpers
// ============================================

function decode<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`Invalid ${what} response: ${issues}`, { cause: result.error });
  }
  return result.data;
}

function toDetection(wire: WireDetection, requestIndex: number): Detection {
  return Object.freeze({
    index: wire.index ?? requestIndex,
    label: wire.label,
    class_id: wire.class_id,
    confidence: wire.confidence,
    bbox_pixels: Object.freeze({ ...wire.bbox_pixels }),
    bbox_yolo: Object.freeze({ ...wire.bbox_yolo }),
  });
}

export function validateTensor(tensor: PixelTensor): void {
  const { shape, data } = tensor;
  if (shape.length !== 3 || shape[2] !== 3) {
    throw new InvalidInputError(`Expected shape (H, W, 3), got (${shape.join(', ')})`);
  }
  if (!(data instanceof Uint8Array || data instanceof Uint8ClampedArray)) {
    throw new InvalidInputError(`Expected dtype uint8, got ${data.constructor.name}`);
  }
  const [height, width] = shape;
  const expected = height * width * 3;
  if (data.length !== expected) {
    throw new InvalidInputError(
      `Invalid tensor size. Expected ${expected} bytes (${width}x${height}x3), got ${data.length} bytes`
    );
  }
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function toTransportError(error: unknown): Error {
  if (axios.isAxiosError(error)) {
    const message = error.message || 'Request failed';
    if (/busy/i.test(message)) {
      return new ServiceBusyError(message);
    }
    return new ConnectionError(message, error.code, { cause: error });
  }
  if (error instanceof Error) {
    if (/busy/i.test(error.message)) return new ServiceBusyError(error.message);
    return new ConnectionError(error.message, undefined, { cause: error });
  }
  return new ConnectionError(String(error));
}
