import type { ControllerKind } from "../types";
import type { DriveController } from "./driveController";
import { type NetworkScaling, type NetworkSpec, NetworkController } from "./networkController";
import { type RuleBasedGains, DEFAULT_RULE_GAINS, RuleBasedController } from "./ruleBasedController";

export interface ControllerOptions {
  gains?: Partial<RuleBasedGains>;
  network?: NetworkSpec;
  scaling?: NetworkScaling;
}

export function createController(kind: ControllerKind, options: ControllerOptions = {}): DriveController {
  switch (kind) {
    case "rule-based":
      return new RuleBasedController({ ...DEFAULT_RULE_GAINS, ...options.gains });
    case "network":
      if (!options.network) {
        throw new Error('createController: kind "network" needs a network spec');
      }
      return new NetworkController(options.network, options.scaling);
  }
}
