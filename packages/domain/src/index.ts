/**
 * @schemata/domain
 *
 * A sample application on the metadata engine: Users, Roles, Movies and
 * Movie_Quotes, declared as schema files under schema/.
 */

export { bootstrap, DOMAIN_ROOT, type BootstrapOptions, type Domain } from "./bootstrap.js";
export * from "./entities/index.js";
export {
  TIMEZONE_PROVIDER,
  timezones,
  timezoneLabel,
  isSupportedTimezone,
  timezoneOptions,
} from "./options/timezones.js";
