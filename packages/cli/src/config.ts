import * as fs from 'node:fs'
import * as path from 'node:path'
import YAML from 'yaml'
import { ErrConfigNotFound, ErrInvalidConfig } from './errors.js'

export interface NamedRule {
  name: string
  expression: string
}

export interface RulesFile {
  version: number
  /** Default table for `quill sql`. */
  table?: string
  rules: NamedRule[]
}

const CONFIG_FILE_NAMES = ['quill.yaml', 'quill.yml']

export class RulesConfig {
  private constructor(
    readonly filePath: string,
    readonly contents: RulesFile,
  ) {}

  get table(): string | undefined {
    return this.contents.table
  }

  get rules(): readonly NamedRule[] {
    return this.contents.rules
  }

  /**
   * Find a rules file by looking for quill.yaml in the current and parent directories
   */
  static find(startDir: string = process.cwd()): RulesConfig | null {
    let currentDir = path.resolve(startDir)

    while (true) {
      for (const name of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, name)
        if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
          return RulesConfig.load(candidate)
        }
      }

      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        // Reached filesystem root
        return null
      }
      currentDir = parentDir
    }
  }

  /** Load a rules file from an explicit path. */
  static load(filePath: string): RulesConfig {
    if (!fs.existsSync(filePath)) {
      throw ErrConfigNotFound.create({ searched: filePath })
    }
    const content = fs.readFileSync(filePath, 'utf-8')
    return new RulesConfig(filePath, parseRulesFile(content, filePath))
  }

  /**
   * The explicit `--config` file when given, otherwise the nearest quill.yaml.
   * Returns null when there is neither.
   */
  static resolve(configOption: string | undefined, cwd: string): RulesConfig | null {
    if (configOption !== undefined) {
      return RulesConfig.load(path.resolve(cwd, configOption))
    }
    return RulesConfig.find(cwd)
  }

  /** Like resolve(), but a missing file is an error. */
  static require(configOption: string | undefined, cwd: string): RulesConfig {
    const config = RulesConfig.resolve(configOption, cwd)
    if (!config) {
      throw ErrConfigNotFound.create({ searched: path.resolve(cwd) })
    }
    return config
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseRulesFile(content: string, file: string): RulesFile {
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (err) {
    throw ErrInvalidConfig.create({ file, reason: err instanceof Error ? err.message : String(err) }, err)
  }

  if (!isRecord(parsed)) {
    throw ErrInvalidConfig.create({ file, reason: 'expected a mapping at the top level' })
  }

  const { version = 1, table, rules = [] } = parsed
  if (typeof version !== 'number') {
    throw ErrInvalidConfig.create({ file, reason: '"version" must be a number' })
  }
  if (table !== undefined && typeof table !== 'string') {
    throw ErrInvalidConfig.create({ file, reason: '"table" must be a string' })
  }
  if (!Array.isArray(rules)) {
    throw ErrInvalidConfig.create({ file, reason: '"rules" must be a list' })
  }

  const seen = new Set<string>()
  const namedRules = rules.map((entry: unknown, i): NamedRule => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.expression !== 'string') {
      throw ErrInvalidConfig.create({ file, reason: `rules[${i}] needs a string "name" and "expression"` })
    }
    if (seen.has(entry.name)) {
      throw ErrInvalidConfig.create({ file, reason: `duplicate rule name "${entry.name}"` })
    }
    seen.add(entry.name)
    return { name: entry.name, expression: entry.expression }
  })

  return table === undefined
    ? { version, rules: namedRules }
    : { version, table, rules: namedRules }
}
