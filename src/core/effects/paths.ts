/**
 * Side-effect path rules.
 *
 * Templates choose the paths of the files they write, so every path is
 * checked before anything touches the disk: relative, made of a small
 * character set, no `.` or `..` segments, and inside the prefix once
 * resolved.
 */
import { isAbsolute, relative, resolve } from 'node:path'


const PATH_RE = /^[-_./a-zA-Z0-9]+$/


/**
 * A side-effect path the writer refuses.
 */
export class EffectPathError extends Error {

    override readonly name = 'EffectPathError' as const

    constructor(
        public readonly path: string,
        public readonly reason: string,
    ) {

        super(`Invalid side-effect path '${path}': ${reason}`)
    }
}


/**
 * Check a path as written by a template.
 *
 * @throws EffectPathError
 *
 * @example
 * ```typescript
 * validateEffectPath('graphs/a.dot')   // ok
 * validateEffectPath('../a.dot')       // throws: '..' segment
 * validateEffectPath('/etc/passwd')    // throws: absolute
 * ```
 */
export function validateEffectPath(path: string): void {

    if (path.length === 0) {

        throw new EffectPathError(path, 'path is empty')
    }

    if (!PATH_RE.test(path)) {

        throw new EffectPathError(path, 'only letters, digits, "-", "_", "." and "/" are allowed')
    }

    if (path.startsWith('/')) {

        throw new EffectPathError(path, 'path is absolute')
    }

    for (const segment of path.split('/')) {

        if (segment === '.' || segment === '..') {

            throw new EffectPathError(path, `'${segment}' segment`)
        }

        if (segment === '') {

            throw new EffectPathError(path, 'empty segment')
        }
    }
}


/**
 * Absolute location of a side-effect file under `prefix`.
 *
 * @throws EffectPathError when the path is invalid or leaves the prefix
 */
export function resolveEffectPath(prefix: string, path: string): string {

    validateEffectPath(path)

    const root = resolve(prefix)
    const target = resolve(root, path)
    const rel = relative(root, target)

    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {

        throw new EffectPathError(path, `resolves outside ${prefix}`)
    }

    return target
}
