import type { ControllerInput, DriveCommand } from "../types";
import type { DriveController } from "./driveController";

export interface DenseLayer {
  /** One row per output neuron, one column per input. */
  weights: number[][];
  biases: number[];
}

export interface NetworkSpec {
  layers: DenseLayer[];
}

export interface NetworkScaling {
  /** Range that maps to an input of 1. */
  rangeCm: number;
  maxPower: number;
  servoRange: number;
}

export const DEFAULT_NETWORK_SCALING: NetworkScaling = {
  rangeCm: 130,
  maxPower: 100,
  servoRange: 10
};

/** Extra inputs after the radar ranges: speed and normalised power. */
export const NETWORK_EXTRA_INPUTS = 2;

export function collectNetworkValidationErrors(spec: NetworkSpec): string[] {
  const errors: string[] = [];

  if (spec.layers.length === 0) {
    errors.push("network needs at least one layer");
    return errors;
  }

  const inputs = spec.layers[0]?.weights[0]?.length ?? 0;
  if (inputs <= NETWORK_EXTRA_INPUTS) {
    errors.push(
      `network takes ${inputs} inputs; it needs radar ranges before the ${NETWORK_EXTRA_INPUTS} state inputs`
    );
  }

  let width: number | null = null;
  spec.layers.forEach((layer, layerIndex) => {
    if (layer.weights.length !== layer.biases.length) {
      errors.push(
        `layer ${layerIndex} has ${layer.weights.length} weight rows but ${layer.biases.length} biases`
      );
    }

    layer.weights.forEach((row, rowIndex) => {
      if (width !== null && row.length !== width) {
        errors.push(`layer ${layerIndex} row ${rowIndex} expects ${row.length} inputs, got ${width}`);
      }
      if (!row.every(Number.isFinite)) {
        errors.push(`layer ${layerIndex} row ${rowIndex} has a non-finite weight`);
      }
    });
    if (!layer.biases.every(Number.isFinite)) {
      errors.push(`layer ${layerIndex} has a non-finite bias`);
    }

    width = layer.weights.length;
  });

  const outputs = spec.layers[spec.layers.length - 1]?.biases.length ?? 0;
  if (outputs !== 2) {
    errors.push(`network must end in 2 outputs (power, servo), got ${outputs}`);
  }

  return errors;
}

function validateNetwork(spec: NetworkSpec): void {
  const errors = collectNetworkValidationErrors(spec);
  if (errors.length > 0) {
    throw new Error(`Invalid network:\n- ${errors.join("\n- ")}`);
  }
}

function activate(layer: DenseLayer, inputs: readonly number[]): number[] {
  return layer.weights.map((row, index) => {
    let sum = layer.biases[index] ?? 0;
    row.forEach((weight, column) => {
      sum += weight * (inputs[column] ?? 0);
    });
    return Math.tanh(sum);
  });
}

/** Dense feed-forward policy with tanh activations on every layer. */
export class NetworkController implements DriveController {
  readonly kind = "network";
  readonly inputSize: number;
  readonly radarCount: number;

  constructor(
    private readonly spec: NetworkSpec,
    private readonly scaling: NetworkScaling = DEFAULT_NETWORK_SCALING
  ) {
    validateNetwork(spec);
    this.inputSize = spec.layers[0]?.weights[0]?.length ?? 0;
    this.radarCount = this.inputSize - NETWORK_EXTRA_INPUTS;
  }

  reset(): void {}

  decide(input: ControllerInput): DriveCommand | null {
    if (input.radarDistances.length !== this.radarCount) {
      return null;
    }

    const features = [
      ...input.radarDistances.map((distance) => distance / this.scaling.rangeCm),
      input.speed,
      input.power / this.scaling.maxPower
    ];
    if (!features.every(Number.isFinite)) {
      return null;
    }

    let activations = features;
    for (const layer of this.spec.layers) {
      activations = activate(layer, activations);
    }

    const [power = 0, servo = 0] = activations;
    return {
      power: power * this.scaling.maxPower,
      servo: servo * this.scaling.servoRange
    };
  }
}
