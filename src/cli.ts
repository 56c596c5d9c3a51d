#!/usr/bin/env node
import { abortOnSignals, main } from './main.ts'

const controller = new AbortController()
const removeListeners = abortOnSignals(controller)

process.exitCode = await main(process.argv.slice(2), { signal: controller.signal })
removeListeners()
