export type BBoxPixels = {
  x: number;
  y: number;
  w: number;
  h: number;
};

/** Normalized 0-1, center format */
export type BBoxYolo = {
  cx: number;
  cy: number;
  w: number;
  h: number;
};

export type Detection = Readonly<{
  index: number;
  label: string;
  class_id: number;
  confidence: number;
  bbox_pixels: Readonly<BBoxPixels>;
  bbox_yolo: Readonly<BBoxYolo>;
}>;

export type InferenceMode = 'jpeg' | 'tensor';

export type TensorData =
  | Uint8Array
  | Uint8ClampedArray
  | Int8Array
  | Uint16Array
  | Int16Array
  | Float32Array
  | Float64Array;

/** Pixel array laid out as [height, width, channels], interleaved */
export type PixelTensor = {
  shape: number[];
  data: TensorData;
};

export type ImageTask = {
  index: number;
  source_path: string;
};

export type TaskOutcome = {
  index: number;
  source_name: string;
  success: boolean;
  detections?: Detection[];
  error?: string;
  attempts: number;
  /** Seconds */
  elapsed: number;
};

export type BatchStatistics = {
  total: number;
  successful: number;
  failed: number;
  total_detections: number;
  /** Seconds of wall-clock time for the whole batch */
  total_time: number;
  avg_inference_time: number;
  throughput_images_per_sec: number;
  class_counts: Record<string, number>;
};

export type BatchReport = {
  statistics: BatchStatistics;
  results: TaskOutcome[];
};

export type InputFormat = {
  endpoint: string;
  method?: string;
  content_type?: string;
  description?: string;
};

export type ServiceCapabilities = {
  model: {
    input_width: number;
    input_height: number;
    channels?: number;
    aspect_ratio?: string;
    classes: Array<{ id: number; name: string }>;
    input_formats: InputFormat[];
    max_queue_size?: number;
  };
  server?: string;
  version?: string;
};

export type ServiceHealth = {
  running: boolean;
  queue_size: number;
  queue_full?: boolean;
  statistics: {
    total_requests: number;
    successful?: number;
    failed?: number;
    busy?: number;
  };
  timing?: {
    average_ms: number;
    min_ms: number;
    max_ms: number;
  };
};

export type LatestInference = {
  /** Base64-encoded JPEG */
  image: string;
  detections: Detection[];
  timestamp: number;
};
