import type { LaunchPhase } from "../types.js";

export interface StateTransitionGraph<State extends string> {
  readonly id: string;
  readonly title: string;
  readonly states: readonly State[];
  readonly initialState: State;
  readonly terminalStates: readonly State[];
  readonly transitions: Readonly<Record<State, readonly State[]>>;
  readonly notes?: readonly string[];
}

export const launchPhaseGraph: StateTransitionGraph<LaunchPhase> = {
  id: "launch-phase",
  title: "Launch Phase State Machine",
  states: ["idle", "generating", "generated", "publishing", "secret-provisioning", "deploying", "deployed", "failed"],
  initialState: "idle",
  terminalStates: ["deployed", "failed"],
  transitions: {
    idle: ["generating"],
    generating: ["generated", "failed"],
    generated: ["publishing", "failed"],
    publishing: ["secret-provisioning", "failed"],
    "secret-provisioning": ["deploying", "failed"],
    deploying: ["deployed", "failed"],
    deployed: [],
    failed: []
  },
  notes: [
    "No edge leads backwards; a new idea starts a new session.",
    "Remote side effects made before a failure stay in place."
  ]
};

export function isAllowedStateTransition<State extends string>(
  graph: StateTransitionGraph<State>,
  current: State,
  next: State
): boolean {
  return graph.transitions[current].includes(next);
}

export function isTerminalState<State extends string>(graph: StateTransitionGraph<State>, state: State): boolean {
  return graph.terminalStates.includes(state);
}

export function renderMermaid<State extends string>(graph: StateTransitionGraph<State>): string {
  const lines: string[] = ["stateDiagram-v2", `  [*] --> ${graph.initialState}`];

  for (const from of graph.states) {
    const nextStates = graph.transitions[from];
    if (nextStates.length === 0 && graph.terminalStates.includes(from)) {
      lines.push(`  ${from} --> [*]`);
      continue;
    }

    for (const next of nextStates) {
      lines.push(`  ${from} --> ${next}`);
    }
  }

  return lines.join("\n");
}
