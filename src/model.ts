import { z } from "zod";
import { FEATURE_COLUMNS } from "./input";

/**
 * The two calls the app makes on a trained classifier.
 *
 * `featureImportances`, when present, is aligned with the feature order.
 */
export interface Classifier {
  predict(vector: readonly number[]): number;
  predictProbability(vector: readonly number[]): number[];
  readonly featureImportances?: readonly number[];
}

export interface Scaler {
  transform(vector: readonly number[]): number[];
}

const FEATURE_COUNT = FEATURE_COLUMNS.length;

const featureColumnsSchema = z
  .array(z.string())
  .refine(
    (cols) =>
      cols.length === FEATURE_COUNT &&
      cols.every((c, i) => c === FEATURE_COLUMNS[i]),
    {
      message:
        `features must be exactly [${FEATURE_COLUMNS.join(", ")}] ` +
        "in this order",
    }
  );

const featureWeightsSchema = z.array(z.number().finite()).length(FEATURE_COUNT);

export const standardScalerSchema = z.object({
  kind: z.literal("standard_scaler"),
  features: featureColumnsSchema,
  mean: featureWeightsSchema,
  scale: featureWeightsSchema,
});

export type StandardScalerArtifact = z.infer<typeof standardScalerSchema>;

const treeNodeSchema = z.union([
  z.object({
    feature: z.number().int().min(0).max(FEATURE_COUNT - 1),
    threshold: z.number().finite(),
    left: z.number().int().min(0),
    right: z.number().int().min(0),
  }),
  z.object({
    value: z.array(z.number().finite().nonnegative()).length(2),
  }),
]);

export type TreeNode = z.infer<typeof treeNodeSchema>;

/**
 * Children must come after their parent and inside the node list, so every
 * walk from the root ends at a leaf. Leaves need a non-empty distribution.
 */
const treeSchema = z
  .object({ nodes: z.array(treeNodeSchema).min(1) })
  .superRefine(({ nodes }, ctx) => {
    nodes.forEach((node, i) => {
      if ("value" in node) {
        if (node.value[0] + node.value[1] <= 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["nodes", i, "value"],
            message: "leaf has an empty class distribution",
          });
        }
        return;
      }
      for (const side of ["left", "right"] as const) {
        const child = node[side];
        if (child <= i || child >= nodes.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["nodes", i, side],
            message: `child ${child} must be between ${i + 1} and ${
              nodes.length - 1
            }`,
          });
        }
      }
    });
  });

const classesSchema = z.tuple([z.literal(0), z.literal(1)]);

export const randomForestSchema = z.object({
  kind: z.literal("random_forest"),
  features: featureColumnsSchema,
  classes: classesSchema,
  featureImportances: featureWeightsSchema.optional(),
  trees: z.array(treeSchema).min(1),
});

export type RandomForestArtifact = z.infer<typeof randomForestSchema>;

export const logisticRegressionSchema = z.object({
  kind: z.literal("logistic_regression"),
  features: featureColumnsSchema,
  classes: classesSchema,
  coefficients: featureWeightsSchema,
  intercept: z.number().finite(),
});

export type LogisticRegressionArtifact = z.infer<
  typeof logisticRegressionSchema
>;

export const classifierArtifactSchema = z.discriminatedUnion("kind", [
  randomForestSchema,
  logisticRegressionSchema,
]);

export type ClassifierArtifact = z.infer<typeof classifierArtifactSchema>;

function assertVectorLength(vector: readonly number[]): void {
  if (vector.length !== FEATURE_COUNT) {
    throw new Error(
      `Expected ${FEATURE_COUNT} features, got ${vector.length}.`
    );
  }
}

/**
 * Standardizes each feature as `(x - mean) / scale`.
 * A zero scale (constant column at fit time) leaves the centred value as is.
 */
export class StandardScaler implements Scaler {
  private readonly mean: readonly number[];
  private readonly scale: readonly number[];

  constructor({ mean, scale }: Pick<StandardScalerArtifact, "mean" | "scale">) {
    this.mean = mean;
    this.scale = scale;
  }

  transform(vector: readonly number[]): number[] {
    assertVectorLength(vector);
    return vector.map((x, i) => {
      const s = this.scale[i] === 0 ? 1 : this.scale[i];
      return (x - this.mean[i]) / s;
    });
  }
}

function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i += 1) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

/**
 * Walks one exported decision tree from the root (node 0).
 *
 * Split nodes send `x[feature] <= threshold` left. Leaf values may be raw
 * class counts; they are normalized here.
 */
function evaluateTree(
  nodes: readonly TreeNode[],
  vector: readonly number[]
): [number, number] {
  let index = 0;
  for (let steps = 0; steps <= nodes.length; steps += 1) {
    const node = nodes[index];
    if (!node) throw new Error(`Tree references missing node ${index}.`);

    if ("value" in node) {
      const [c0, c1] = node.value;
      const total = c0 + c1;
      if (total <= 0) {
        throw new Error(`Leaf ${index} has an empty class distribution.`);
      }
      return [c0 / total, c1 / total];
    }

    index = vector[node.feature] <= node.threshold ? node.left : node.right;
  }
  throw new Error("Tree contains a cycle.");
}

/**
 * Ensemble of decision trees; the class distribution is the mean of the
 * per-tree leaf distributions.
 */
export class RandomForestClassifier implements Classifier {
  readonly featureImportances?: readonly number[];
  private readonly trees: ReadonlyArray<readonly TreeNode[]>;

  constructor(
    artifact: Pick<RandomForestArtifact, "trees" | "featureImportances">
  ) {
    this.trees = artifact.trees.map((t) => t.nodes);
    this.featureImportances = artifact.featureImportances;
  }

  predictProbability(vector: readonly number[]): number[] {
    assertVectorLength(vector);
    let p0 = 0;
    let p1 = 0;
    for (const nodes of this.trees) {
      const [a, b] = evaluateTree(nodes, vector);
      p0 += a;
      p1 += b;
    }
    return [p0 / this.trees.length, p1 / this.trees.length];
  }

  predict(vector: readonly number[]): number {
    return argmax(this.predictProbability(vector));
  }
}

export class LogisticRegressionClassifier implements Classifier {
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor({
    coefficients,
    intercept,
  }: Pick<LogisticRegressionArtifact, "coefficients" | "intercept">) {
    this.coefficients = coefficients;
    this.intercept = intercept;
  }

  private decision(vector: readonly number[]): number {
    assertVectorLength(vector);
    return vector.reduce(
      (acc, x, i) => acc + x * this.coefficients[i],
      this.intercept
    );
  }

  predictProbability(vector: readonly number[]): number[] {
    const p1 = 1 / (1 + Math.exp(-this.decision(vector)));
    return [1 - p1, p1];
  }

  predict(vector: readonly number[]): number {
    return this.decision(vector) > 0 ? 1 : 0;
  }
}

export function createClassifier(artifact: ClassifierArtifact): Classifier {
  switch (artifact.kind) {
    case "random_forest":
      return new RandomForestClassifier(artifact);
    case "logistic_regression":
      return new LogisticRegressionClassifier(artifact);
  }
}
