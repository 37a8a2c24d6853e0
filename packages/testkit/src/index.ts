export { createTempStoreRoot, removeDir, withTempDatabase, withTempDir } from "./fs.js";
