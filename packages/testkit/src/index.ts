export { createTempDir, removeDir, withTempDir, writeJsonFile, writeTextFile } from "./fs.js";
export { BufferedOutput } from "./output.js";
export { fixturePath } from "./fixtures.js";
export type { FixtureName } from "./fixtures.js";
