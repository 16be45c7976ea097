import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ArtifactLoadError, ModelInferenceError } from '../models/EngineErrors';
import { loggers } from '../utils/logger';

// Fitted components the model path depends on. The JSON-backed classes
// below implement them; tests substitute their own doubles.

export interface FittedScaler {
  transform(row: readonly number[]): number[];
}

export interface FittedRegressor {
  predict(row: readonly number[]): number;
}

export interface FittedClassifier {
  predict(row: readonly number[]): number;
}

export interface FittedLabelEncoder {
  transform(label: string): number;
  inverseTransform(code: number): string;
}

export interface ModelArtifactBundle {
  scaler: FittedScaler;
  riskModel: FittedRegressor;
  reliabilityModel: FittedClassifier;
  fleetEncoder: FittedLabelEncoder;
  reliabilityEncoder: FittedLabelEncoder;
  ageEncoder: FittedLabelEncoder;
  featureColumns: readonly string[];
}

export type ArtifactBundleState =
  | { status: 'loaded'; bundle: ModelArtifactBundle; directory?: string }
  | { status: 'unavailable'; reason: string };

// Serialized artifact schemas

const finiteNumber = z.number().finite();

const scalerSchema = z.object({
  type: z.literal('standard_scaler'),
  mean: z.array(finiteNumber).min(1),
  scale: z.array(finiteNumber.refine(value => value !== 0, 'scale must be non-zero')).min(1),
});

const regressorSchema = z.object({
  type: z.literal('linear_regressor'),
  coefficients: z.array(finiteNumber).min(1),
  intercept: finiteNumber,
});

const classifierSchema = z.object({
  type: z.literal('logistic_classifier'),
  classes: z.array(z.number().int()).min(2),
  coefficients: z.array(z.array(finiteNumber).min(1)).min(2),
  intercepts: z.array(finiteNumber).min(2),
});

const labelEncoderSchema = z.object({
  type: z.literal('label_encoder'),
  classes: z.array(z.string().min(1)).min(1)
    .refine(classes => new Set(classes).size === classes.length, 'classes must be unique'),
});

const featureColumnsSchema = z.array(z.string().min(1)).min(1);

export const ARTIFACT_FILES = {
  scaler: 'scaler.json',
  riskModel: 'risk_score_model.json',
  reliabilityModel: 'reliability_model.json',
  fleetEncoder: 'fleet_encoder.json',
  reliabilityEncoder: 'reliability_encoder.json',
  ageEncoder: 'age_encoder.json',
  featureColumns: 'feature_columns.json',
} as const;

const expectWidth = (row: readonly number[], width: number, component: string): void => {
  if (row.length !== width) {
    throw new ModelInferenceError(`${component} expects ${width} features, received ${row.length}`);
  }
};

const dot = (weights: readonly number[], row: readonly number[]): number =>
  weights.reduce((sum, weight, index) => sum + weight * row[index], 0);

export class StandardScaler implements FittedScaler {
  constructor(private readonly mean: readonly number[], private readonly scale: readonly number[]) {}

  get width(): number {
    return this.mean.length;
  }

  transform(row: readonly number[]): number[] {
    expectWidth(row, this.width, 'Scaler');
    return row.map((value, index) => (value - this.mean[index]) / this.scale[index]);
  }
}

export class LinearRegressor implements FittedRegressor {
  constructor(private readonly coefficients: readonly number[], private readonly intercept: number) {}

  get width(): number {
    return this.coefficients.length;
  }

  predict(row: readonly number[]): number {
    expectWidth(row, this.width, 'Risk regressor');
    return this.intercept + dot(this.coefficients, row);
  }
}

/** Multinomial linear classifier: predicts the class with the largest decision value. */
export class LogisticClassifier implements FittedClassifier {
  constructor(
    private readonly classes: readonly number[],
    private readonly coefficients: readonly (readonly number[])[],
    private readonly intercepts: readonly number[]
  ) {}

  get width(): number {
    return this.coefficients[0]?.length ?? 0;
  }

  predict(row: readonly number[]): number {
    expectWidth(row, this.width, 'Reliability classifier');

    let bestIndex = 0;
    let bestScore = Number.NEGATIVE_INFINITY;
    this.coefficients.forEach((weights, index) => {
      const score = this.intercepts[index] + dot(weights, row);
      if (score > bestScore) {
        bestScore = score;
        bestIndex = index;
      }
    });

    return this.classes[bestIndex];
  }
}

export class LabelEncoder implements FittedLabelEncoder {
  constructor(readonly name: string, private readonly classes: readonly string[]) {}

  transform(label: string): number {
    const code = this.classes.indexOf(label);
    if (code === -1) {
      throw new ModelInferenceError(`${this.name} encoder has no class "${label}"`);
    }
    return code;
  }

  inverseTransform(code: number): string {
    const label = this.classes[code];
    if (label === undefined) {
      throw new ModelInferenceError(`${this.name} encoder has no class for code ${code}`);
    }
    return label;
  }
}

async function readArtifact<S extends z.ZodTypeAny>(
  directory: string,
  file: string,
  schema: S
): Promise<z.infer<S>> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(directory, file), 'utf8');
  } catch (error) {
    throw new ArtifactLoadError(`${file} could not be read`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ArtifactLoadError(`${file} is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ArtifactLoadError(`${file} failed validation${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Read and cross-check every artifact in `directory`. Throws ArtifactLoadError
 * on the first missing, malformed or inconsistent file.
 */
export async function readModelArtifacts(directory: string): Promise<ModelArtifactBundle> {
  const [scaler, riskModel, reliabilityModel, fleetEncoder, reliabilityEncoder, ageEncoder, featureColumns] =
    await Promise.all([
      readArtifact(directory, ARTIFACT_FILES.scaler, scalerSchema),
      readArtifact(directory, ARTIFACT_FILES.riskModel, regressorSchema),
      readArtifact(directory, ARTIFACT_FILES.reliabilityModel, classifierSchema),
      readArtifact(directory, ARTIFACT_FILES.fleetEncoder, labelEncoderSchema),
      readArtifact(directory, ARTIFACT_FILES.reliabilityEncoder, labelEncoderSchema),
      readArtifact(directory, ARTIFACT_FILES.ageEncoder, labelEncoderSchema),
      readArtifact(directory, ARTIFACT_FILES.featureColumns, featureColumnsSchema),
    ]);

  const width = featureColumns.length;
  const widths: Array<[string, number]> = [
    ['scaler mean', scaler.mean.length],
    ['scaler scale', scaler.scale.length],
    ['risk regressor', riskModel.coefficients.length],
    ...reliabilityModel.coefficients.map((row, index): [string, number] => [`reliability classifier row ${index}`, row.length]),
  ];

  for (const [component, componentWidth] of widths) {
    if (componentWidth !== width) {
      throw new ArtifactLoadError(`${component} has ${componentWidth} features but feature_columns lists ${width}`);
    }
  }

  if (reliabilityModel.coefficients.length !== reliabilityModel.classes.length ||
      reliabilityModel.intercepts.length !== reliabilityModel.classes.length) {
    throw new ArtifactLoadError('reliability classifier classes, coefficients and intercepts disagree in length');
  }

  return {
    scaler: new StandardScaler(scaler.mean, scaler.scale),
    riskModel: new LinearRegressor(riskModel.coefficients, riskModel.intercept),
    reliabilityModel: new LogisticClassifier(
      reliabilityModel.classes,
      reliabilityModel.coefficients,
      reliabilityModel.intercepts
    ),
    fleetEncoder: new LabelEncoder('Fleet', fleetEncoder.classes),
    reliabilityEncoder: new LabelEncoder('Reliability category', reliabilityEncoder.classes),
    ageEncoder: new LabelEncoder('Age category', ageEncoder.classes),
    featureColumns,
  };
}

/**
 * Load the artifact bundle once. Any failure marks the whole bundle
 * unavailable; callers keep the returned state for the life of the process.
 */
export async function loadModelArtifacts(directory: string): Promise<ArtifactBundleState> {
  try {
    const bundle = await readModelArtifacts(directory);
    loggers.artifacts.loaded(directory, bundle.featureColumns.length);
    return { status: 'loaded', bundle, directory };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    loggers.artifacts.unavailable(directory, reason);
    return { status: 'unavailable', reason };
  }
}
