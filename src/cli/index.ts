/**
 * panchanga CLI
 *
 * Commands:
 *   panchanga compute <DD/MM/YYYY> <HH:MM> [±HH:MM] [--positions]
 *   panchanga now [±HH:MM]
 *   panchanga serve
 *   panchanga benchmark
 */

import 'dotenv/config'
import type { CelestialPositions, PanchangaResult } from '../types.js'
import {
  computePanchanga,
  computePositions,
  formatTithi,
  getPanchangaForDate,
} from '../api/index.js'
import { loadConfig } from '../config/index.js'
import { startServer, parsePanchangRequest, parseUtcOffset } from '../server/index.js'

const args = process.argv.slice(2)
const command = args[0]

async function main() {
  switch (command) {
    case 'compute':
      cmdCompute(args.slice(1))
      break
    case 'now':
      cmdNow(args[1])
      break
    case 'serve':
      await cmdServe()
      break
    case 'benchmark':
      cmdBenchmark()
      break
    default:
      printHelp()
      process.exit(command && command !== 'help' ? 1 : 0)
  }
}

function printHelp() {
  console.log(`panchanga — Tithi, Nakshatra, Yoga, Karana and Rashi (Lahiri ayanamsa)

Commands:
  compute <DD/MM/YYYY> <HH:MM> [±HH:MM]   Panchanga for a local date and time (zone default +00:00)
      --positions                          Also print Sun/Moon longitudes and the ayanamsa
  now [±HH:MM]                            Panchanga for the current instant (zone default +00:00)
  serve                                   Start the HTTP service (SERVER_HOST, SERVER_PORT, LOG_LEVEL)
  benchmark                               Time 10,000 computations

Examples:
  panchanga compute 15/08/2023 12:30 +05:30
  panchanga compute 01/01/2000 12:00 --positions
  panchanga now +05:30`)
}

function cmdCompute(cmdArgs: string[]) {
  const showPositions = cmdArgs.includes('--positions')
  const [date, time, zone = '+00:00'] = cmdArgs.filter(a => a !== '--positions')

  const request = parsePanchangRequest({ date, time, zone })
  if (!request.ok) {
    console.error(request.error)
    console.error('Usage: panchanga compute <DD/MM/YYYY> <HH:MM> [±HH:MM]')
    process.exit(1)
  }

  const result = computePanchanga(request.value)
  if (!result.ok) {
    console.error(result.error.message)
    process.exit(1)
  }

  printPanchanga(result.value)
  if (showPositions) printPositions(computePositions(request.value))
}

function cmdNow(zoneArg?: string) {
  const zone = zoneArg ?? '+00:00'
  const offset = parseUtcOffset(zone)
  if (offset === null) {
    console.error(`Invalid zone: ${zone}. Use [+|-]HH:MM format.`)
    process.exit(1)
  }

  const now = new Date()
  console.log(`Panchanga for ${now.toISOString().slice(0, 16)} UTC (zone ${zone}):`)
  printPanchanga(getPanchangaForDate(now, offset))
}

async function cmdServe() {
  const config = loadConfig()
  const server = await startServer(config)

  const shutdown = () => {
    server.close(err => {
      if (err) {
        console.error(err.message)
        process.exit(1)
      }
      process.exit(0)
    })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

function cmdBenchmark() {
  console.log('panchanga benchmark\n')

  const N = 10000
  const start = performance.now()
  for (let i = 0; i < N; i++) {
    computePanchanga({
      year: 2025,
      month: 1 + (i % 12),
      day: 1 + (i % 28),
      hour: i % 24,
      minute: i % 60,
      utcOffsetMinutes: 330,
    })
  }
  const ms = performance.now() - start
  console.log(`computePanchanga × ${N}: ${ms.toFixed(1)} ms  (${(ms / N * 1000).toFixed(1)} µs/call)`)
}

function printPanchanga(p: PanchangaResult) {
  console.log(`  Tithi:      ${formatTithi(p)} (${p.tithiIndex})`)
  console.log(`  Nakshatra:  ${p.nakshatraName} (${p.nakshatraIndex})`)
  console.log(`  Yoga:       ${p.yogaName} (${p.yogaIndex})`)
  console.log(`  Karana:     ${p.karanaName} (${p.karanaIndex})`)
  console.log(`  Rashi:      ${p.rashiName} (${p.rashiIndex})`)
}

function printPositions(pos: CelestialPositions) {
  console.log('')
  console.log(`  JD (UT):    ${pos.julian.julianDay.toFixed(5)}`)
  console.log(`  T:          ${pos.julian.centuriesSinceJ2000.toFixed(9)}`)
  console.log(`  Ayanamsa:   ${pos.ayanamsa.toFixed(4)}°`)
  console.log(`  Sun:        ${pos.sunTropical.degrees.toFixed(4)}° tropical, ${pos.sunSidereal.degrees.toFixed(4)}° sidereal`)
  console.log(`  Moon:       ${pos.moonTropical.degrees.toFixed(4)}° tropical, ${pos.moonSidereal.degrees.toFixed(4)}° sidereal`)
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
