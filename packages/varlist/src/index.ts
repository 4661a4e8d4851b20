/**
 * @seqparse/varlist
 *
 * A client grammar for labelled, comma-delimited variable lists.
 *
 * @module
 */

export { label, item, readVariables, parseVariableList, type VariableList } from "./varlist.js";
