import type { Row } from "@schemata/contracts";
import { AuditableModel } from "../auditable.model.js";

export const MOVIE_QUOTES_RELATIONSHIP = "movies_movie_quotes";

export class MoviesModel extends AuditableModel {
  /** Active link rows to this movie's quotes */
  async quoteLinks(): Promise<Row[]> {
    const relationship = await this.relationship(MOVIE_QUOTES_RELATIONSHIP);
    return relationship ? relationship.relatedRecords(this) : [];
  }

  /** "Heat (1995)", or the bare title when the year is unknown */
  displayTitle(): string {
    const title = String(this.get("name") ?? "");
    const year = this.get("release_year");
    return typeof year === "number" ? `${title} (${year})` : title;
  }
}
