export {
  SAM_ID,
  CHRIS_GAMES_ID,
  CHRIS_MORE_GAMES_ID,
  PAT_HOMEWORK_ID,
  JAMIE_DESIGN_ID,
  fixtureTodos,
} from "./fixtures.js";
export {
  createTempStoreRoot,
  removeDir,
  writeTodoFiles,
  withTempStore,
  withTempDir,
} from "./fs.js";
