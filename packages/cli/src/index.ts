import { errorMessage } from "@toolgate/core";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`toolgate: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
