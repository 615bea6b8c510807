import { ReservedDirectiveError, SelectorFrozenError } from "../errors.js";
import type { SessionDirective, SessionDirectiveChoice } from "../feedback-types.js";

export const DEFAULT_SESSION_DIRECTIVE: SessionDirective = "continue";

export type SessionDirectiveOption = {
  value: SessionDirectiveChoice;
  label: string;
  description: string;
  enabled: boolean;
};

export const SESSION_DIRECTIVE_OPTIONS: readonly SessionDirectiveOption[] = [
  {
    value: "continue",
    label: "continue session",
    description: "the agent waits for further instructions and keeps the current context",
    enabled: true,
  },
  {
    value: "terminate",
    label: "finish task",
    description: "the agent completes the current task and stops asking for feedback",
    enabled: true,
  },
  {
    value: "pause",
    label: "pause session",
    description: "reserved; not available yet",
    enabled: false,
  },
];

export function isSessionDirective(value: unknown): value is SessionDirective {
  return value === "continue" || value === "terminate";
}

export class SessionDirectiveSelector {
  private active: SessionDirective = DEFAULT_SESSION_DIRECTIVE;
  private frozen = false;
  private readonly listeners = new Set<(directive: SessionDirective) => void>();

  current(): SessionDirective {
    return this.active;
  }

  select(choice: SessionDirectiveChoice): void {
    if (this.frozen) {
      throw new SelectorFrozenError();
    }
    if (!isSessionDirective(choice)) {
      throw new ReservedDirectiveError(choice);
    }
    if (choice === this.active) {
      return;
    }
    this.active = choice;
    for (const listener of this.listeners) {
      listener(choice);
    }
  }

  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  describe(): string {
    const option = SESSION_DIRECTIVE_OPTIONS.find((entry) => entry.value === this.active);
    return option?.description ?? this.active;
  }

  subscribe(listener: (directive: SessionDirective) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
