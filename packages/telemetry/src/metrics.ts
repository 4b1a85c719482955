/**
 * Session counters. Lazily created on first access; no-op instruments
 * when no meter provider is registered.
 */

import type { Counter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "droidprobe";

let _snapshots: Counter | undefined;
let _incidents: Counter | undefined;
let _perturbations: Counter | undefined;

/**
 * Screen captures, labelled with `outcome` (success | failure).
 */
export function getSnapshotCounter(): Counter {
  if (_snapshots === undefined) {
    _snapshots = metrics.getMeter(METER_NAME).createCounter("droidprobe.snapshots", {
      description: "Screen captures attempted by the sampler",
    });
  }
  return _snapshots;
}

/**
 * Data-loss incidents, labelled with `reason`.
 */
export function getIncidentCounter(): Counter {
  if (_incidents === undefined) {
    _incidents = metrics.getMeter(METER_NAME).createCounter("droidprobe.incidents", {
      description: "Data-loss incidents recorded by the monitor",
    });
  }
  return _incidents;
}

/**
 * Perturbation actions, labelled with `task` and `outcome`.
 */
export function getPerturbationCounter(): Counter {
  if (_perturbations === undefined) {
    _perturbations = metrics.getMeter(METER_NAME).createCounter("droidprobe.perturbations", {
      description: "Lifecycle perturbations applied to the device",
    });
  }
  return _perturbations;
}
