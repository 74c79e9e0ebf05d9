#!/usr/bin/env node
import dotenv from "dotenv";
import { createProgram } from "./app";

dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error("[FATAL]", err);
    process.exitCode = 1;
  });
