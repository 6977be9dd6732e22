/**
 * Side-effect file writer.
 *
 * Materializes the `sys_Write` rows of a run under a prefix directory.
 * All paths are resolved before the first write, so one bad path means
 * no file is written.
 */
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { SideEffectRecord } from '../engine/types.js'
import { resolveEffectPath } from './paths.js'


export interface WriteEffectsOptions {

    /** Directory files are written under; nothing is written when null */
    prefix: string | null
}

export interface WriteEffectsResult {

    /** Absolute paths written, in record order */
    written: string[]

    /** Records not written for lack of a prefix */
    skipped: number
}


/**
 * Write side-effect records to disk.
 *
 * @throws EffectPathError for a path the rules reject
 *
 * @example
 * ```typescript
 * const { written } = await writeEffects(result.effects, { prefix: 'out' })
 * ```
 */
export async function writeEffects(
    effects: readonly SideEffectRecord[],
    options: WriteEffectsOptions,
): Promise<WriteEffectsResult> {

    if (effects.length === 0) {

        return { written: [], skipped: 0 }
    }

    const { prefix } = options

    if (prefix === null) {

        observer.emit('effects:warning', {
            message: `${effects.length} side-effect file(s) not written: no prefix directory given`,
            count: effects.length,
        })

        return { written: [], skipped: effects.length }
    }

    const targets = effects.map((effect) => ({
        effect,
        target: resolveEffectPath(prefix, effect.path),
    }))

    const written: string[] = []

    for (const { effect, target } of targets) {

        const [, err] = await attempt(async () => {

            await mkdir(dirname(target), { recursive: true })
            await writeFile(target, effect.content, 'utf-8')
        })

        if (err) {

            observer.emit('error', { source: 'effects', error: err, context: { path: effect.path } })

            throw err
        }

        written.push(target)

        observer.emit('effects:written', {
            path: effect.path,
            bytes: Buffer.byteLength(effect.content, 'utf8'),
        })
    }

    return { written, skipped: 0 }
}
