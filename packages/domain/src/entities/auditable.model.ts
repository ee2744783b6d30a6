/**
 * Auditable Model
 *
 * Base class for entities that keep a version counter and a change log.
 * Both columns are core fields registered on this class, so every subclass
 * inherits them without declaring them in its schema file.
 */

import { z } from "zod";
import type { FieldMap } from "@schemata/contracts";
import { EntityModel, type CoreFieldsProvider } from "@schemata/platform";

export const AUDITABLE_CORE_FIELDS: FieldMap = {
  audit_trail: {
    name: "audit_trail",
    type: "BigText",
    label: "Audit Trail",
    description: "JSON log of the changes made to this record",
    readOnly: true,
    nullable: true,
  },
  version: {
    name: "version",
    type: "Integer",
    label: "Version",
    description: "Incremented on every update",
    readOnly: true,
    defaultValue: 1,
  },
};

const auditEntrySchema = z.object({
  action: z.enum(["create", "update"]),
  at: z.string(),
  by: z.string(),
});

export type AuditEntry = z.infer<typeof auditEntrySchema>;

const auditTrailSchema = z.array(auditEntrySchema);

export abstract class AuditableModel extends EntityModel {
  /** Call before metadata is loaded */
  static registerCoreFields(provider: CoreFieldsProvider): void {
    provider.registerModelCoreFields(AuditableModel, AUDITABLE_CORE_FIELDS);
  }

  /** Entries in the order they were recorded; an unreadable log reads as empty */
  auditTrail(): AuditEntry[] {
    const raw = this.get("audit_trail");
    if (typeof raw !== "string" || raw === "") return [];
    try {
      const parsed = auditTrailSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : [];
    } catch {
      this.logger.warn("Ignoring unreadable audit trail", { entity: this.name, id: this.get("id") });
      return [];
    }
  }

  override async create(): Promise<boolean> {
    const previous = this.snapshotAudit();
    this.set("version", 1);
    this.recordAudit("create");

    const created = await super.create();
    if (!created) this.restoreAudit(previous);
    return created;
  }

  override async update(): Promise<boolean> {
    this.requireId("update");
    const previous = this.snapshotAudit();
    const version = this.get("version");
    this.set("version", typeof version === "number" ? version + 1 : 1);
    this.recordAudit("update");

    const updated = await super.update();
    if (!updated) this.restoreAudit(previous);
    return updated;
  }

  private recordAudit(action: AuditEntry["action"]): void {
    const entry: AuditEntry = { action, at: new Date().toISOString(), by: this.currentUserId() };
    this.set("audit_trail", JSON.stringify([...this.auditTrail(), entry]));
  }

  private snapshotAudit(): { version: unknown; trail: unknown } {
    return { version: this.get("version"), trail: this.get("audit_trail") };
  }

  private restoreAudit(previous: { version: unknown; trail: unknown }): void {
    this.set("version", previous.version);
    this.set("audit_trail", previous.trail);
  }
}
