// Output formatting utilities for the calmirror CLI.
// Data to stdout, hints/progress to stderr.
//
// All structured data is output as YAML (js-yaml). In TTY mode, keys are
// dimmed and list dashes cyan. In non-TTY mode, colors are disabled so piped
// output is plain, machine-parseable YAML.
// Line wrapping is set to Infinity (no folding) everywhere.

import yaml from 'js-yaml'
import pc from 'picocolors'
import { AuthError } from './api-utils.js'

// ---------------------------------------------------------------------------
// TTY detection (used for coloring decisions)
// ---------------------------------------------------------------------------

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/**
 * Colorize a YAML string for TTY output.
 * List dashes are cyan, keys are dimmed, values stay at terminal default.
 */
export function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = toYaml(data)
  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

/**
 * Print a list of items as YAML.
 * Output shape:
 *   items:
 *     - key: value
 */
export function printList(items: Record<string, unknown>[]): void {
  printYaml({ items })
}

// ---------------------------------------------------------------------------
// Stderr hints (data to stdout, hints to stderr)
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

// ---------------------------------------------------------------------------
// Centralized command error handler (errore pattern)
// ---------------------------------------------------------------------------

/** Message shown for a command-level error. AuthError gets a login hint. */
export function describeCommandError(err: Error): string {
  if (err instanceof AuthError) return `${err.message}. Try: calmirror login`
  return err.message
}

/** Handle any error from a client method in a command context.
 *  Prints a user-friendly message to stderr and exits. */
export function handleCommandError(err: Error): never {
  error(describeCommandError(err))
  process.exit(1)
}
