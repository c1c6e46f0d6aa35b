/** Root of every error raised by the pipeline */
export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raster lacks required geospatial metadata or has an unusable layout */
export class RasterValidationError extends PipelineError {}

export class TileSizeError extends PipelineError {
  constructor(readonly tileSize: unknown) {
    super(
      `tile size must be a positive integer number of pixels, got ${String(tileSize)}`,
    );
  }
}

/** Fatal before processing starts, never retried */
export class ConfigurationError extends PipelineError {}

export class EmptyTrainingSetError extends ConfigurationError {
  constructor() {
    super("cannot train on an empty tile collection");
  }
}

export class ModelNotFoundError extends ConfigurationError {
  constructor(readonly reference: string, options?: ErrorOptions) {
    super(`model artifact not found: ${reference}`, options);
  }
}

export class NoTilesError extends ConfigurationError {
  constructor(readonly location: string) {
    super(`no tiles found in ${location}`);
  }
}

/** Persisted document is malformed */
export class SerializationError extends PipelineError {}

export class ModelArtifactError extends SerializationError {}

export class FeatureExtractionError extends PipelineError {}

export class TileReadError extends PipelineError {}

export class AggregatorFinalizedError extends PipelineError {
  constructor() {
    super("metrics were already finalized for this run");
  }
}

export class RunnerStateError extends PipelineError {}

/** Human readable cause of anything thrown */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
