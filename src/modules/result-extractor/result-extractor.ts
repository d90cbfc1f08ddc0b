/**
 * Structured-result extraction from agent transcripts.
 *
 * The agent process writes newline-delimited stream events. Assistant text
 * inside those events may embed any number of ```json fenced blocks: drafts,
 * corrections, examples. The payload the agent intended as its answer is the
 * newest block that decodes to an object carrying the required field.
 *
 * Search order:
 * 1. Assistant text segments, newest segment first, last block first
 * 2. Whole raw output after unescaping \n, \" and \\, last block first
 * 3. Single-level `{...}` objects that mention the field as a quoted key,
 *    last match first
 *
 * Every function here is pure and never throws.
 */

import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A decoded JSON object produced by an agent */
export type StructuredPayload = Record<string, unknown>

/** Result of {@link extractFirstMatching} */
export interface ExtractionMatch {
  payload: StructuredPayload
  /** The field name that matched */
  field: string
}

/** Assistant text recovered from the event stream */
export interface EventTextScan {
  texts: string[]
  /** Number of lines that decoded as event records */
  eventCount: number
}

// ---------------------------------------------------------------------------
// Event stream parsing
// ---------------------------------------------------------------------------

/**
 * Collect assistant-authored text segments from stream-json output, in
 * emission order. Lines that are not JSON are ignored.
 */
export function parseEventTexts(rawOutput: string): EventTextScan {
  const texts: string[] = []
  let eventCount = 0

  for (const line of rawOutput.split('\n')) {
    if (line.trim() === '') continue

    let event: unknown
    try {
      event = JSON.parse(line)
    } catch {
      continue
    }
    if (!isPlainObject(event)) continue
    eventCount++

    if (event.type !== 'assistant') continue
    const message = event.message
    if (!isPlainObject(message) || !Array.isArray(message.content)) continue

    for (const part of message.content) {
      if (isPlainObject(part) && part.type === 'text' && typeof part.text === 'string') {
        texts.push(part.text)
      }
    }
  }

  return { texts, eventCount }
}

// ---------------------------------------------------------------------------
// Fenced block detection
// ---------------------------------------------------------------------------

/**
 * Return the bodies of all ```json fenced blocks in `text`, in document order.
 * A block ends at the next fence, so braces nested inside it are kept whole.
 */
export function extractFencedJsonBlocks(text: string): string[] {
  const fencePattern = /```json[^\S\n]*\n?([\s\S]*?)```/gi
  const blocks: string[] = []
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(text)) !== null) {
    const body = match[1]
    if (body !== undefined && body.trim() !== '') {
      blocks.push(body.trim())
    }
  }

  return blocks
}

/**
 * Undo the escaping applied to text embedded in JSON strings.
 */
export function unescapeText(text: string): string {
  return text.replace(/\\n/g, '\n').replace(/\\"/g, '"').replace(/\\\\/g, '\\')
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeObject(candidate: string): StructuredPayload | null {
  try {
    const value: unknown = JSON.parse(candidate)
    return isPlainObject(value) ? value : null
  } catch {
    return null
  }
}

function findInCandidates(
  candidates: readonly string[],
  requiredField: string
): StructuredPayload | null {
  for (let i = candidates.length - 1; i >= 0; i--) {
    const candidate = candidates[i]
    if (candidate === undefined) continue
    const decoded = decodeObject(candidate)
    if (decoded !== null && Object.prototype.hasOwnProperty.call(decoded, requiredField)) {
      return decoded
    }
  }
  return null
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// ---------------------------------------------------------------------------
// extractStructuredResult
// ---------------------------------------------------------------------------

/**
 * Locate the structured payload an agent intended as its final answer.
 *
 * @param rawOutput     - Captured stdout of the agent process
 * @param requiredField - Key that must be present on the accepted object
 * @returns The decoded object, or null when no candidate qualifies
 */
export function extractStructuredResult(
  rawOutput: string,
  requiredField: string
): StructuredPayload | null {
  if (rawOutput.trim() === '') return null

  const { texts } = parseEventTexts(rawOutput)
  for (let i = texts.length - 1; i >= 0; i--) {
    const text = texts[i]
    if (text === undefined) continue
    const found = findInCandidates(extractFencedJsonBlocks(text), requiredField)
    if (found !== null) return found
  }

  const unescaped = unescapeText(rawOutput)
  const fromWholeText = findInCandidates(extractFencedJsonBlocks(unescaped), requiredField)
  if (fromWholeText !== null) return fromWholeText

  const loosePattern = new RegExp(`\\{[^{}]*"${escapeRegExp(requiredField)}"[^{}]*\\}`, 'g')
  return findInCandidates(unescaped.match(loosePattern) ?? [], requiredField)
}

/**
 * Try each field name in order and return the first payload found.
 *
 * Agents drift between equivalent marker names (`files_modified` versus
 * `files_changed`); callers list the accepted names by preference.
 */
export function extractFirstMatching(
  rawOutput: string,
  fields: readonly string[]
): ExtractionMatch | null {
  for (const field of fields) {
    const payload = extractStructuredResult(rawOutput, field)
    if (payload !== null) return { payload, field }
  }
  return null
}
