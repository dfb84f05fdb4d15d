import { AppError, ErrorCodes } from '../../utils/errors.js'

export const SCORES_FILE_NAME = 'scores.txt'

// Plain decimal floats only: no hex, binary, Infinity or NaN.
const DECIMAL_FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

export type ScoreLine = {
  label: string
  value: number
}

/** Parses `label: value` lines. Blank lines are skipped; anything else malformed is fatal. */
export const parseScoresFile = (text: string): ScoreLine[] => {
  const parsed: ScoreLine[] = []

  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, '')
    if (line.trim().length === 0) {
      return
    }

    const parts = line.split(':')
    if (parts.length !== 2) {
      throw new AppError(ErrorCodes.MALFORMED_RESULT, 'score line must contain exactly one colon', 422, {
        line: index + 1
      })
    }

    const [rawLabel = '', rawValue = ''] = parts
    const label = rawLabel.trim()
    const valueText = rawValue.trim()
    const value = DECIMAL_FLOAT.test(valueText) ? Number(valueText) : Number.NaN
    if (label.length === 0 || !Number.isFinite(value)) {
      throw new AppError(ErrorCodes.MALFORMED_RESULT, 'score line is not a label and a number', 422, {
        line: index + 1
      })
    }

    parsed.push({ label, value })
  })

  return parsed
}
