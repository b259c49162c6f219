/**
 * Filesystem module exports.
 */

export { type WalkEntry, type WalkCallback, walkDirectory, collectFiles, pathExists } from "./walk.js";
