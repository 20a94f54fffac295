import * as Joi from 'joi';

export type TrackingMode = 'single' | 'fusion';

export interface SourceConfig {
  name: string;
  url: string;
  enabled: boolean;
  /** Higher wins when sources disagree. */
  priority: number;
}

export interface TrackingConfig {
  mode: TrackingMode;
  frame_interval_ms: number;
  trail: {
    sample_interval_ms: number;
    max_age_seconds: number;
  };
  staleness: {
    fresh_seconds: number;
    stale_seconds: number;
    min_opacity: number;
  };
}

export interface ViewportConfig {
  latitude: number;
  longitude: number;
  zoom_level: number;
  min_zoom: number;
  max_zoom: number;
  sensitivity: number;
  pixel_sensitivity: number;
  width: number;
  height: number;
  tile_radius: number;
  pan_threshold_deg: number;
}

export interface FeedsConfig {
  poll_interval_ms: number;
  retry_delay_ms: number;
  timeout_ms: number;
}

export interface AppConfig {
  api: {
    enabled: boolean;
    port: number;
  };
  tracking: TrackingConfig;
  receiver: {
    latitude: number;
    longitude: number;
  };
  coverage: {
    enabled: boolean;
  };
  viewport: ViewportConfig;
  feeds: FeedsConfig;
  sources: SourceConfig[];
}

const latitude = Joi.number().min(-90).max(90);
const longitude = Joi.number().min(-180).max(180);

export const configValidationSchema = Joi.object<AppConfig>({
  api: Joi.object({
    enabled: Joi.boolean().required(),
    port: Joi.number().port().default(1937),
  }).required(),
  tracking: Joi.object({
    mode: Joi.string().valid('single', 'fusion').required(),
    frame_interval_ms: Joi.number().integer().min(16).default(250),
    trail: Joi.object({
      sample_interval_ms: Joi.number().integer().min(0).default(2000),
      max_age_seconds: Joi.number().min(1).default(300),
    }).default(),
    staleness: Joi.object({
      fresh_seconds: Joi.number().min(0).default(10),
      stale_seconds: Joi.number().min(0).default(30),
      min_opacity: Joi.number().min(0).max(1).default(0.1),
    })
      .default()
      .custom((value: TrackingConfig['staleness'], helpers) =>
        value.stale_seconds < value.fresh_seconds
          ? helpers.message({ custom: 'tracking.staleness.stale_seconds must be >= fresh_seconds' })
          : value,
      ),
  }).required(),
  receiver: Joi.object({
    latitude: latitude.required(),
    longitude: longitude.required(),
  }).required(),
  coverage: Joi.object({
    enabled: Joi.boolean().default(true),
  }).default(),
  viewport: Joi.object({
    latitude: latitude.required(),
    longitude: longitude.required(),
    zoom_level: Joi.number().integer().min(0).max(19).default(10),
    min_zoom: Joi.number().greater(0).default(0.1),
    max_zoom: Joi.number().greater(0).default(10),
    sensitivity: Joi.number().greater(0).default(0.1),
    pixel_sensitivity: Joi.number().greater(0).default(0.002),
    width: Joi.number().integer().min(1).default(1280),
    height: Joi.number().integer().min(1).default(720),
    tile_radius: Joi.number().integer().min(0).default(3),
    pan_threshold_deg: Joi.number().min(0).default(0.001),
  }).required(),
  feeds: Joi.object({
    poll_interval_ms: Joi.number().integer().min(100).max(60000).default(1000),
    retry_delay_ms: Joi.number().integer().min(0).default(5000),
    timeout_ms: Joi.number().integer().min(100).default(3000),
  }).default(),
  sources: Joi.array()
    .items(
      Joi.object({
        name: Joi.string().required(),
        url: Joi.string().uri().required(),
        enabled: Joi.boolean().required(),
        priority: Joi.number().integer().min(0).max(255).default(100),
      }),
    )
    .min(1)
    .unique('name')
    .required(),
});
