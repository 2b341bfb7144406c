import type { Action, ActionExecution } from '../types/action.js';
import type { ToolConfig } from './config.js';

export interface RegistryInfo {
  name: string;
  version: string;
  description: string;
}

/**
 * Immutable snapshot of the actions loaded from one configuration read.
 */
export class ActionRegistry {
  public readonly info: Readonly<RegistryInfo>;

  /**
   * Actions in declaration order.
   */
  public readonly actions: readonly Action[];

  private readonly byName: ReadonlyMap<string, Action>;

  constructor(info: RegistryInfo, actions: readonly Action[]) {
    const frozen = actions.map((action) => freezeAction(action));
    const byName = new Map<string, Action>();

    for (const action of frozen) {
      if (byName.has(action.name)) {
        throw new Error(`duplicate action name: ${action.name}`);
      }

      byName.set(action.name, action);
    }

    this.info = Object.freeze({ ...info });
    this.actions = Object.freeze(frozen);
    this.byName = byName;
  }

  get size(): number {
    return this.actions.length;
  }

  get(name: string): Action | undefined {
    return this.byName.get(name);
  }

  static empty(info: RegistryInfo = { name: '', version: '', description: '' }): ActionRegistry {
    return new ActionRegistry(info, []);
  }
}

function freezeExecution(execution: ActionExecution): ActionExecution {
  if (execution.kind === 'process') {
    return Object.freeze({ ...execution, args: Object.freeze([...execution.args]) });
  }

  return Object.freeze({ ...execution, headers: Object.freeze({ ...execution.headers }) });
}

function freezeAction(action: Action): Action {
  return Object.freeze({
    ...action,
    parameters: Object.freeze(action.parameters.map((parameter) => Object.freeze({ ...parameter }))),
    execution: freezeExecution(action.execution),
    environment: Object.freeze({ ...action.environment }),
  });
}

export function buildRegistry(config: ToolConfig): ActionRegistry {
  return new ActionRegistry(
    {
      name: config.name,
      version: config.version,
      description: config.description,
    },
    config.tools,
  );
}
