#!/usr/bin/env node
/**
 * CLI entry point for rowcast.
 *
 * @example
 * ```bash
 * rowcast graph.rt > graph.dot      # Render to stdout
 * rowcast --sql graph.rt            # Print the SQL script only
 * rowcast --prefix out pages.rt     # Also write side-effect files under out/
 * ```
 */
import meow from 'meow'

import { runCli } from './run.js'


const HELP_TEXT = `
  Usage
    $ rowcast [options] SOURCE

  Options
    --sql, -s           Print the SQL script instead of running it
    --db <file>         SQLite database file (default: in memory)
    --prefix <dir>      Write side-effect files under <dir>
    --quiet, -q         Only report errors
    --verbose, -v       Report every event
    --help              Show this help
    --version           Show version

  Environment
    ROWCAST_DB          Database file
    ROWCAST_PREFIX      Side-effect directory
    ROWCAST_LOG_LEVEL   silent | error | warn | info | verbose

  Examples
    $ rowcast graph.rt > graph.dot
    $ rowcast --sql graph.rt | sqlite3
    $ rowcast --db data.db --prefix out pages.rt
`


const cli = meow(HELP_TEXT, {
    importMeta: import.meta,
    flags: {
        sql: {
            type: 'boolean',
            shortFlag: 's',
            default: false
        },
        db: {
            type: 'string'
        },
        prefix: {
            type: 'string'
        },
        quiet: {
            type: 'boolean',
            shortFlag: 'q',
            default: false
        },
        verbose: {
            type: 'boolean',
            shortFlag: 'v',
            default: false
        }
    }
})


process.exitCode = await runCli(cli.input, {
    sql: cli.flags.sql,
    db: cli.flags.db,
    prefix: cli.flags.prefix,
    quiet: cli.flags.quiet,
    verbose: cli.flags.verbose
}, {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
    color: process.stderr.isTTY
})
