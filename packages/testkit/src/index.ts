export { assert, describe, test } from "./nodeTest.js";
export {
  createRecordingSolver,
  type RecordingSolver,
  type RecordingSolverOptions,
  type SolverCall,
} from "./recordingSolver.js";
