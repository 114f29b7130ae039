import { GuestrunError, GuestrunErrorCode } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import type { Guest } from '../guest/types.js';
import type { StepData } from './types.js';

/**
 * What a plugin may see of the step it is bound to. Plugins hold this
 * view rather than the step itself.
 */
export interface StepContext {
  readonly name: string;
  readonly workdir: string;
  readonly logger: Logger;
}

export abstract class Plugin<C extends StepContext = StepContext> {
  readonly step: C;
  readonly how: string;
  readonly name: string;
  protected readonly data: StepData;
  protected readonly log: Logger;

  constructor(step: C, data: StepData) {
    this.step = step;
    this.data = data;
    this.how = data.how;
    this.name = data.name ?? 'default-0';
    this.log = step.logger.child({ how: this.how, phase: this.name });
  }

  /** Boolean option; anything other than `true` reads as false. */
  flag(key: string): boolean {
    return this.data[key] === true;
  }

  async wake(): Promise<void> {
    this.log.debug({ data: this.data }, 'plugin woken up');
  }

  /** Configuration lines, one per option, for `show()`. */
  show(): string[] {
    const lines = [`how ${this.how}`];
    for (const [key, value] of Object.entries(this.data)) {
      if (key === 'how' || value === undefined) continue;
      lines.push(`${key} ${Array.isArray(value) ? value.join(', ') : String(value)}`);
    }
    return lines;
  }

  /** Packages that need to be installed on guests for this plugin. */
  requires(): string[] {
    return [];
  }

  /** Whether the phase applies to the guest, based on the `where` option. */
  enabledOnGuest(guest: Guest): boolean {
    const where = this.data['where'];
    if (where === undefined || where === null) return true;
    const targets = Array.isArray(where) ? where.map(String) : [String(where)];
    return targets.includes(guest.name) || (guest.role !== undefined && targets.includes(guest.role));
  }
}

export type PluginFactory<C extends StepContext, P extends Plugin<C>> = (step: C, data: StepData) => P;

interface RegisteredMethod<C extends StepContext, P extends Plugin<C>> {
  how: string;
  description: string;
  factory: PluginFactory<C, P>;
}

/** Explicit mapping of `how` identifiers to plugin implementations. */
export class MethodRegistry<C extends StepContext, P extends Plugin<C>> {
  private readonly registered: Map<string, RegisteredMethod<C, P>> = new Map();

  constructor(readonly step: string) {}

  register(how: string, description: string, factory: PluginFactory<C, P>): this {
    if (this.registered.has(how)) {
      throw new GuestrunError(
        GuestrunErrorCode.SPECIFICATION_ERROR,
        `Method '${how}' is already registered for the ${this.step} step.`
      );
    }
    this.registered.set(how, { how, description, factory });
    return this;
  }

  has(how: string): boolean {
    return this.registered.has(how);
  }

  methods(): Array<{ how: string; description: string }> {
    return Array.from(this.registered.values()).map(m => ({ how: m.how, description: m.description }));
  }

  /** Build the plugin instance matching the record's `how`. */
  delegate(step: C, data: StepData): P {
    const method = this.registered.get(data.how);
    if (!method) {
      throw new GuestrunError(
        GuestrunErrorCode.SPECIFICATION_ERROR,
        `Unsupported ${this.step} method '${data.how}'.`,
        { supported: Array.from(this.registered.keys()) }
      );
    }
    return method.factory(step, data);
  }
}
