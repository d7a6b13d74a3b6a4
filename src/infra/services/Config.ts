import type { Config, EligibilityRules, EntityKind, IdFormat } from '../../core/ports';
import type { PolicyConfig } from '../config/policySchema';

// Synchronous configuration service implementing Config port interface
// Config is loaded at startup from policy.json and doesn't change
export class ConfigImpl implements Config {
  constructor(private readonly policy: PolicyConfig) {}

  eligibility(): EligibilityRules {
    return {
      marriedMinAge: this.policy.eligibility.marriedMinAge,
      singleMinAge: this.policy.eligibility.singleMinAge,
    };
  }

  idFormat(): IdFormat {
    return { ...this.policy.ids };
  }

  // Copy so callers cannot rewrite the loaded policy
  dataFiles(): Record<EntityKind, string> {
    return { ...this.policy.dataFiles };
  }
}
