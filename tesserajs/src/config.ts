import { ConfigurationError, TileSizeError } from "./errors.js";

export const DEFAULT_TILE_SIZE = 256;

export interface TilingConfig {
  /** side of the square tiles, in pixels */
  tileSize: number;
}

/** Limits the health evaluator checks a finalized run against */
export interface HealthConfig {
  /** failed / (inferred + failed) above which the run is degraded */
  maxFailureRatio: number;
  /** share of the most predicted class above which drift is suspected */
  maxClassProportion: number;
  /** relative change of feature mean or std from the training baseline */
  maxBaselineDrift: number;
}

export const DEFAULT_HEALTH_CONFIG: Readonly<HealthConfig> = Object.freeze({
  maxFailureRatio: 0.1,
  maxClassProportion: 0.9,
  maxBaselineDrift: 0.5,
});

export function validateTileSize(tileSize: unknown): number {
  if (
    typeof tileSize !== "number" ||
    !Number.isInteger(tileSize) ||
    tileSize <= 0
  )
    throw new TileSizeError(tileSize);
  return tileSize;
}

/** Fill the gaps with defaults and reject out-of-range limits */
export function healthConfig(overrides?: Partial<HealthConfig>): HealthConfig {
  // an override explicitly set to undefined keeps the default
  const value = (key: keyof HealthConfig): number =>
    overrides?.[key] ?? DEFAULT_HEALTH_CONFIG[key];
  const config: HealthConfig = {
    maxFailureRatio: value("maxFailureRatio"),
    maxClassProportion: value("maxClassProportion"),
    maxBaselineDrift: value("maxBaselineDrift"),
  };

  if (!(config.maxFailureRatio > 0 && config.maxFailureRatio <= 1))
    throw new ConfigurationError(
      `maxFailureRatio must be in (0, 1], got ${config.maxFailureRatio}`,
    );
  if (!(config.maxClassProportion >= 0.5 && config.maxClassProportion <= 1))
    throw new ConfigurationError(
      `maxClassProportion must be in [0.5, 1], got ${config.maxClassProportion}`,
    );
  if (!(config.maxBaselineDrift > 0))
    throw new ConfigurationError(
      `maxBaselineDrift must be positive, got ${config.maxBaselineDrift}`,
    );

  return config;
}
