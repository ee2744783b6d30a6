/**
 * Validation Rule Catalog
 *
 * Discovers the registered rule classes once and answers two questions:
 * what rules exist (descriptors for API and UI consumers), and which rule
 * instance a field's configured rule name stands for.
 */

import type { FieldType, Logger, ValidationRuleDescriptor } from "@schemata/contracts";
import { SchemaError } from "../errors/index.js";
import { createLogger, describeError } from "../logging/index.js";
import { extractRuleNameFromClassName, type ValidationRule } from "../validation/rule.js";
import { VALIDATION_RULES, type ValidationRuleClass } from "../validation/rules.js";

export interface ValidationRuleCatalogOptions {
  /** Rule classes to discover; defaults to the built-in set */
  rules?: readonly ValidationRuleClass[];
  logger?: Logger;
}

export class ValidationRuleCatalog {
  private readonly ruleClasses: readonly ValidationRuleClass[];
  private readonly logger: Logger;
  private descriptors: Map<string, ValidationRuleDescriptor> | null = null;
  private readonly classesByName = new Map<string, ValidationRuleClass>();

  constructor(options: ValidationRuleCatalogOptions = {}) {
    this.ruleClasses = options.rules ?? VALIDATION_RULES;
    this.logger = options.logger ?? createLogger("validation-rules");
  }

  /**
   * Instantiates every rule class and describes it.
   * A class that fails to instantiate is logged and skipped.
   */
  scan(): Map<string, ValidationRuleDescriptor> {
    if (this.descriptors) return this.descriptors;

    const descriptors = new Map<string, ValidationRuleDescriptor>();
    for (const ruleClass of this.ruleClasses) {
      const name = extractRuleNameFromClassName(ruleClass.name);
      try {
        const rule = new ruleClass();
        descriptors.set(name, {
          name,
          implementingClass: ruleClass.name,
          description: rule.description,
          clientSideExpression: rule.clientSideExpression(),
          appliesTo: [...rule.appliesTo],
        });
        this.classesByName.set(name, ruleClass);
      } catch (err) {
        this.logger.warn("Skipping validation rule that failed to instantiate", {
          ruleClass: ruleClass.name,
          error: describeError(err),
        });
      }
    }

    this.descriptors = descriptors;
    this.logger.debug("Discovered validation rules", { rules: [...descriptors.keys()] });
    return descriptors;
  }

  descriptor(name: string): ValidationRuleDescriptor | undefined {
    return this.scan().get(name);
  }

  has(name: string): boolean {
    return this.scan().has(name);
  }

  names(): string[] {
    return [...this.scan().keys()];
  }

  /** Descriptors of the rules that apply to the given field type */
  rulesForFieldType(type: FieldType): ValidationRuleDescriptor[] {
    return [...this.scan().values()].filter((rule) => rule.appliesTo.includes(type));
  }

  /** A fresh rule instance for a configured rule name */
  create(name: string): ValidationRule {
    this.scan();
    const ruleClass = this.classesByName.get(name);
    if (!ruleClass) {
      throw new SchemaError(`Unknown validation rule "${name}". Available: ${this.names().join(", ")}`, {
        key: name,
      });
    }
    return new ruleClass();
  }
}
