export { Validator, Extractor } from "../../index.js";
export { ValidateInstance } from "../plugins/validate-instance.js";
export { ValidateInstance as ValidateInstanceAlias } from "../plugins/validate-instance.js";
