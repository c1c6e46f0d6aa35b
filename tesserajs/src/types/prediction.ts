/** Binary class: 1 when the feature is above the model threshold */
export type PredictedClass = 0 | 1;

export interface FeatureVector {
  meanIntensity: number;
  stdIntensity: number;
}

export interface Prediction {
  tileId: string;
  prediction: PredictedClass;
  meanIntensity: number;
  stdIntensity: number;
  /** ISO-8601 */
  timestamp: string;
}
