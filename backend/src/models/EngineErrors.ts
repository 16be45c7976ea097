// Internal failures of the model path. None of these reach API callers:
// the prediction engine converts each one into a fallback prediction.

export class ArtifactLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArtifactLoadError';
  }
}

export class FeatureDerivationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FeatureDerivationError';
  }
}

export class ModelInferenceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ModelInferenceError';
  }
}
