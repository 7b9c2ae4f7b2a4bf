import { existsSync } from 'fs'
import { delimiter, join } from 'path'

export type Platform = 'mac' | 'linux' | 'windows'

export function getPlatform(): Platform {
  switch (process.platform) {
    case 'darwin': return 'mac'
    case 'linux': return 'linux'
    case 'win32': return 'windows'
    default: return 'linux'
  }
}

/** Location used when the tool is neither configured nor on PATH (the container install) */
export const FALLBACK_TOOL_PATHS: Record<string, string> = {
  makemkvcon: '/usr/local/bin/makemkvcon'
}

/** Search the directories of PATH for an existing executable named `tool` */
export function findOnPath(tool: string, pathEnv: string | undefined = process.env.PATH): string | null {
  if (!pathEnv) return null
  const names = getPlatform() === 'windows' ? [`${tool}.exe`, tool] : [tool]
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue
    for (const name of names) {
      const candidate = join(dir, name)
      if (existsSync(candidate)) return candidate
    }
  }
  return null
}

/**
 * Resolve a tool binary.
 * Priority: configured path (when it exists) > PATH search > fixed install location.
 */
export function findToolPath(tool: string, configuredPath?: string | null): string {
  if (configuredPath && existsSync(configuredPath)) return configuredPath
  return findOnPath(tool) || FALLBACK_TOOL_PATHS[tool] || tool
}
