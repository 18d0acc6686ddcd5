#!/usr/bin/env node
import { errorMessage } from '../core/errors'
import { runCli } from './cli'

// ─── Entry ──────────────────────────────────────────────────

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error(`[CRITICAL] ${errorMessage(err)}`)
    process.exitCode = 1
  })
