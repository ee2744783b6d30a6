import { EntityModel } from "@schemata/platform";
import { timezoneLabel } from "../../options/timezones.js";

export const USER_ROLES_RELATIONSHIP = "users_roles";

export class UsersModel extends EntityModel {
  /** First and last name, falling back to the username */
  displayName(): string {
    const parts = [this.get("first_name"), this.get("last_name")].filter(
      (part): part is string => typeof part === "string" && part.trim() !== ""
    );
    return parts.length > 0 ? parts.join(" ") : String(this.get("username") ?? "");
  }

  timezoneLabel(): string | null {
    const timezone = this.get("user_timezone");
    return typeof timezone === "string" ? timezoneLabel(timezone) : null;
  }

  /** Ids of the roles currently granted */
  async roleIds(): Promise<unknown[]> {
    const relationship = await this.relationship(USER_ROLES_RELATIONSHIP);
    if (!relationship) return [];
    const idField = relationship.modelIdField("Roles");
    return (await relationship.relatedRecords(this)).map((row) => row[idField]);
  }

  /** Stamps the login time and saves */
  async recordLogin(at: Date = new Date()): Promise<boolean> {
    this.set("last_login", at.toISOString());
    return this.update();
  }
}
