import { InvalidPhaseTransitionError } from "../errors";

/**
 * Phase sequences for the three orchestration runs. Each is linear: the only
 * valid transition from a phase is to the one that follows it.
 *
 * ```
 * bootstrap  Preflight → CredentialsGenerated → ComputeBootstrapped → NetworkBootstrapped
 *            → StorageBootstrapped → Persisted → Finalized
 * join       Unjoined → TokenValidated → CertificateIssued → ComputeJoined → StorageJoined
 *            → NetworkJoined → Registered → Online
 * leave      Online → Draining → RemovedFromCompute → RemovedFromStorage
 *            → RemovedFromNetwork → Removed
 * ```
 */
export const BOOTSTRAP_PHASES = [
  "Preflight",
  "CredentialsGenerated",
  "ComputeBootstrapped",
  "NetworkBootstrapped",
  "StorageBootstrapped",
  "Persisted",
  "Finalized",
] as const;

export const JOIN_PHASES = [
  "Unjoined",
  "TokenValidated",
  "CertificateIssued",
  "ComputeJoined",
  "StorageJoined",
  "NetworkJoined",
  "Registered",
  "Online",
] as const;

export const LEAVE_PHASES = [
  "Online",
  "Draining",
  "RemovedFromCompute",
  "RemovedFromStorage",
  "RemovedFromNetwork",
  "Removed",
] as const;

export type BootstrapPhase = (typeof BOOTSTRAP_PHASES)[number];
export type JoinPhase = (typeof JOIN_PHASES)[number];
export type LeavePhase = (typeof LEAVE_PHASES)[number];

export function nextPhase<P extends string>(phases: readonly P[], from: P): P | undefined {
  const index = phases.indexOf(from);
  if (index === -1 || index === phases.length - 1) return undefined;
  return phases[index + 1];
}

export function isValidTransition<P extends string>(phases: readonly P[], from: P, to: P): boolean {
  return nextPhase(phases, from) === to;
}

export type PhaseRecord<P extends string> = {
  phase: P;
  at: Date;
};

export type PhaseObserver<P extends string> = (phase: P, previous: P) => void;

/** Forward-only cursor over a phase sequence, with a timestamped history. */
export class PhasePipeline<P extends string> {
  private readonly records: PhaseRecord<P>[];

  constructor(
    readonly name: string,
    private readonly phases: readonly [P, ...P[]],
    private readonly observer?: PhaseObserver<P>,
  ) {
    this.records = [{ phase: phases[0], at: new Date() }];
  }

  get current(): P {
    return this.records[this.records.length - 1].phase;
  }

  get history(): readonly PhaseRecord<P>[] {
    return this.records;
  }

  get finished(): boolean {
    return this.current === this.phases[this.phases.length - 1];
  }

  advance(to: P): void {
    const from = this.current;
    if (!isValidTransition(this.phases, from, to)) {
      throw new InvalidPhaseTransitionError(this.name, from, to);
    }
    this.records.push({ phase: to, at: new Date() });
    this.observer?.(to, from);
  }
}
