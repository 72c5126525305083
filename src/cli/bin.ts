#!/usr/bin/env node
import { run } from "./index";
import { log } from "../constants/log";
import { errorMessage } from "../types/errors";

run(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.fail(errorMessage(error));
    process.exitCode = 1;
  }
);
