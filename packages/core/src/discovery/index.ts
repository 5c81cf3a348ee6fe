/**
 * Discovery module - action files to route definitions
 */

export {
  actionFileToNameParts,
  definitionFromActionFile,
  type ActionNameParts,
} from "./action-discoverer";
