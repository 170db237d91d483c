#!/usr/bin/env node
/**
 * @entry plagiscore CLI 入口
 */

import { createProgram } from './createProgram.js'
import { printError } from '../shared/error.js'

createProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    printError(e)
    process.exitCode = 1
  })
