#!/usr/bin/env node

import { runCli } from './cli/program';

runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('处理文件时出错:', error);
    process.exitCode = 1;
  });
