import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'

dotenv.config()

const serverRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..')

export const AGGREGATES_PATH = path.join(serverRoot, 'data', 'aggregates.json')

export interface ServerSettings {
  port: number
  aggregatesPath: string
}

const parsePort = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback
  const port = Number(raw)
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    console.warn(`Ignoring invalid PORT "${raw}", using ${fallback}`)
    return fallback
  }
  return port
}

export const loadServerSettings = (env: NodeJS.ProcessEnv = process.env): ServerSettings => ({
  port: parsePort(env.PORT, 8051),
  aggregatesPath: AGGREGATES_PATH
})
