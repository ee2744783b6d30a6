import type { EntityModelClass } from "@schemata/platform";
import { MoviesModel } from "./movies/movies.model.js";
import { UsersModel } from "./users/users.model.js";

export { AuditableModel, AUDITABLE_CORE_FIELDS, type AuditEntry } from "./auditable.model.js";
export { MoviesModel, MOVIE_QUOTES_RELATIONSHIP } from "./movies/movies.model.js";
export { UsersModel, USER_ROLES_RELATIONSHIP } from "./users/users.model.js";

/** Entities with their own model class; the rest use EntityModel */
export const modelClasses: Record<string, EntityModelClass> = {
  Movies: MoviesModel,
  Users: UsersModel,
};
