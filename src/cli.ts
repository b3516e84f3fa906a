#!/usr/bin/env node
// ============================================================
// Command-line runner — one capture, JSON record to stdout or a file
// ============================================================
// Usage:
//   streetview-capture --lat 17.408 --lon 78.451 [--no-llm] [--output run.json] [--config '{"max_fanout":2}']
//
// --no-llm swaps in the stub oracle so the geometry and Maps stages can be
// checked without Gemini credentials. Exit code 1 when the run ends in error.
// ============================================================

import 'dotenv/config'
import { writeFile } from 'fs/promises'
import { parseArgs } from 'util'
import { loadBindings } from './config'
import { collaboratorsFromBindings } from './index'
import type { MappingCollaborator, VisionOracle } from './pipeline/collaborators'
import { captureBuilding } from './pipeline/capture'
import { errorMessage } from './pipeline/errors'
import { StubOracle } from './services/stub-oracle'

export const USAGE = 'Usage: streetview-capture --lat <deg> --lon <deg> [--no-llm] [--output <file>] [--config <json>]'

export interface CliDeps {
  maps: MappingCollaborator | null
  oracle: VisionOracle
  write: (path: string, contents: string) => Promise<void>
  print: (text: string) => void
}

export interface CliArgs {
  lat: number
  lon: number
  noLlm: boolean
  output: string | null
  config: unknown
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      lat: { type: 'string' },
      lon: { type: 'string' },
      long: { type: 'string' },
      output: { type: 'string', short: 'o' },
      config: { type: 'string' },
      'no-llm': { type: 'boolean', default: false }
    },
    strict: true
  })

  const lat = Number(values.lat)
  const lon = Number(values.lon ?? values.long)
  if (values.lat === undefined || !Number.isFinite(lat)) throw new Error('--lat must be a number')
  if ((values.lon ?? values.long) === undefined || !Number.isFinite(lon)) throw new Error('--lon must be a number')

  let config: unknown = {}
  if (values.config !== undefined) {
    try {
      config = JSON.parse(values.config)
    } catch {
      throw new Error('--config must be a JSON object')
    }
  }

  return { lat, lon, noLlm: values['no-llm'] === true, output: values.output ?? null, config }
}

/** Run one capture; resolves to the process exit code */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (err) {
    console.error(`[CLI] ${errorMessage(err)}\n${USAGE}`)
    return 2
  }

  if (!deps.maps) {
    console.error('[CLI] GOOGLE_MAPS_API_KEY is not set')
    return 2
  }

  const oracle = args.noLlm ? new StubOracle() : deps.oracle
  console.log(`[CLI] Capturing (${args.lat}, ${args.lon}) with oracle ${oracle.name}`)
  const run = await captureBuilding({ latitude: args.lat, longitude: args.lon }, args.config, { maps: deps.maps, oracle })

  const json = JSON.stringify(run, null, 2)
  if (args.output) {
    await deps.write(args.output, json)
    console.log(`[CLI] Run record written to ${args.output}`)
  } else {
    deps.print(json)
  }
  return run.status === 'error' ? 1 : 0
}

if (require.main === module) {
  const bindings = loadBindings(process.env)
  runCli(process.argv.slice(2), {
    ...collaboratorsFromBindings(bindings),
    write: (path, contents) => writeFile(path, contents, 'utf8'),
    print: (text) => process.stdout.write(`${text}\n`)
  }).then(
    (code) => { process.exitCode = code },
    (err: unknown) => {
      console.error(`[CLI] ${errorMessage(err)}`)
      process.exitCode = 1
    }
  )
}
