import { DuplicateFrameworkError, UnknownFrameworkError } from '../errors.js';
import type { Framework } from './framework.js';

// Read-only once startup has registered everything; shared freely between deployments.
export class FrameworkRegistry {
  private readonly entries = new Map<string, Framework>();

  registerFramework(framework: Framework): void {
    if (this.entries.has(framework.id)) {
      throw new DuplicateFrameworkError(framework.id);
    }
    this.entries.set(framework.id, framework);
  }

  framework(id: string): Framework {
    const framework = this.entries.get(id);
    if (!framework) {
      throw new UnknownFrameworkError(id);
    }
    return framework;
  }

  frameworks(): Framework[] {
    return Array.from(this.entries.values());
  }
}
