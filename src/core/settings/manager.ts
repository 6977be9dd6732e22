/**
 * Settings Manager
 *
 * Loads, validates, and provides access to project settings from .rowcast/settings.yml.
 */
import { readFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { parseSettings } from './schema.js'
import { createDefaultSettings, SETTINGS_DIR_PATH } from './defaults.js'
import { applyEnvironment } from './env.js'

import type { Settings, LoggingConfig, CompileConfig, ExecuteConfig } from './types.js'


/**
 * Options for SettingsManager construction.
 */
export interface SettingsManagerOptions {

    /** Override settings directory (default: .rowcast) */
    settingsDir?: string

    /** Override settings file name (default: settings.yml) */
    settingsFile?: string

    /** Environment read for overrides (default: process.env) */
    env?: Record<string, string | undefined>
}


/**
 * Manages project settings from .rowcast/settings.yml.
 *
 * Settings are loaded once and cached. A missing file means defaults.
 *
 * @example
 * ```typescript
 * const manager = new SettingsManager(process.cwd())
 * await manager.load()
 *
 * const { database, prefix } = manager.getExecute()
 * ```
 */
export class SettingsManager {

    #projectRoot: string
    #settingsDir: string
    #settingsFile: string
    #env: Record<string, string | undefined>
    #settings: Settings | null = null

    constructor(projectRoot: string, options: SettingsManagerOptions = {}) {

        this.#projectRoot = projectRoot
        this.#settingsDir = options.settingsDir ?? SETTINGS_DIR_PATH
        this.#settingsFile = options.settingsFile ?? 'settings.yml'
        this.#env = options.env ?? process.env
    }

    // ─────────────────────────────────────────────────────────────
    // Path Helpers
    // ─────────────────────────────────────────────────────────────

    /**
     * Get the full path to the settings directory.
     */
    get settingsDirPath(): string {

        return join(this.#projectRoot, this.#settingsDir)
    }

    /**
     * Get the full path to the settings file.
     */
    get settingsFilePath(): string {

        return join(this.settingsDirPath, this.#settingsFile)
    }

    // ─────────────────────────────────────────────────────────────
    // Loading
    // ─────────────────────────────────────────────────────────────

    /**
     * Check if the settings file exists.
     */
    async exists(): Promise<boolean> {

        const [, err] = await attempt(() => access(this.settingsFilePath))

        return !err
    }

    /**
     * Load settings from disk and apply environment overrides.
     *
     * If the file doesn't exist, defaults are used without error.
     * Invalid YAML or schema violations throw.
     *
     * @throws SettingsValidationError if settings are invalid
     */
    async load(): Promise<Settings> {

        const fileExists = await this.exists()

        if (!fileExists) {

            return this.#finish(createDefaultSettings(), false)
        }

        const [content, readErr] = await attempt(() =>
            readFile(this.settingsFilePath, 'utf-8')
        )

        if (readErr) {

            throw new Error(`Failed to read settings file: ${readErr.message}`, { cause: readErr })
        }

        const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

        if (yamlErr) {

            throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`, { cause: yamlErr })
        }

        return this.#finish(parseSettings(parsed), true)
    }

    #finish(settings: Settings, fromFile: boolean): Settings {

        this.#settings = applyEnvironment(settings, this.#env)

        observer.emit('settings:loaded', {
            path: this.settingsFilePath,
            fromFile,
        })

        return this.#settings
    }

    // ─────────────────────────────────────────────────────────────
    // Accessors
    // ─────────────────────────────────────────────────────────────

    /**
     * Whether settings have been loaded.
     */
    get isLoaded(): boolean {

        return this.#settings !== null
    }

    /**
     * Get the loaded settings.
     *
     * @throws Error if not loaded
     */
    get settings(): Settings {

        return this.#assertLoaded()
    }

    getLogging(): LoggingConfig {

        return this.#assertLoaded().logging
    }

    getCompile(): CompileConfig {

        return this.#assertLoaded().compile
    }

    getExecute(): ExecuteConfig {

        return this.#assertLoaded().execute
    }

    #assertLoaded(): Settings {

        if (!this.#settings) {

            throw new Error('Settings not loaded. Call load() first.')
        }

        return this.#settings
    }
}
