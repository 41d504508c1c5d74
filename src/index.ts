#!/usr/bin/env node
import { Project } from "ts-morph";
import { runCli } from "./cli";

// Files are read and written through ts-morph's host; no sources are parsed
process.exitCode = runCli(process.argv, { fileSystem: new Project().getFileSystem() });
