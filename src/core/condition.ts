import type { Condition } from "../models/types"
import type { PresetCondition } from "./document"
import { createCoreError, CoreErrorCodes, type CoreError } from "./errors"

export type ConditionExpander = (value: string, path: string) => string

/**
 * Evaluates a preset condition. Operand strings are macro-expanded before comparison.
 * @throws {CoreError} INVALID_CONDITION when an operand required by the condition type is missing
 */
export const evaluateCondition = (
  condition: PresetCondition | undefined,
  expand: ConditionExpander,
  path = "condition",
): boolean => {
  if (condition === undefined) {
    return true
  }
  if (typeof condition === "boolean") {
    return condition
  }

  switch (condition.type) {
    case "const":
      return requireOperand(condition.value, "value", condition, path)
    case "equals":
    case "notEquals": {
      const lhs = expand(requireOperand(condition.lhs, "lhs", condition, path), `${path}.lhs`)
      const rhs = expand(requireOperand(condition.rhs, "rhs", condition, path), `${path}.rhs`)
      return (lhs === rhs) === (condition.type === "equals")
    }
    case "inList":
    case "notInList": {
      const value = expand(requireOperand(condition.string, "string", condition, path), `${path}.string`)
      const list = requireOperand(condition.list, "list", condition, path).map((item, index) =>
        expand(item, `${path}.list.${index}`),
      )
      return list.includes(value) === (condition.type === "inList")
    }
    case "matches":
    case "notMatches": {
      const value = expand(requireOperand(condition.string, "string", condition, path), `${path}.string`)
      const pattern = compilePattern(requireOperand(condition.regex, "regex", condition, path), path)
      return pattern.test(value) === (condition.type === "matches")
    }
    case "anyOf":
      return requireOperand(condition.conditions, "conditions", condition, path).some((nested, index) =>
        evaluateCondition(nested, expand, `${path}.conditions.${index}`),
      )
    case "allOf":
      return requireOperand(condition.conditions, "conditions", condition, path).every((nested, index) =>
        evaluateCondition(nested, expand, `${path}.conditions.${index}`),
      )
    case "not":
      return !evaluateCondition(requireOperand(condition.condition, "condition", condition, path), expand, `${path}.condition`)
  }
}

const requireOperand = <T>(value: T | undefined, operand: string, condition: Condition, path: string): T => {
  if (value === undefined) {
    throw invalidCondition(`Condition of type "${condition.type}" requires "${operand}"`, path, {
      type: condition.type,
      operand,
    })
  }
  return value
}

const compilePattern = (regex: string, path: string): RegExp => {
  try {
    return new RegExp(regex)
  } catch (error) {
    throw invalidCondition(
      `Invalid regular expression "${regex}": ${error instanceof Error ? error.message : String(error)}`,
      `${path}.regex`,
      { regex },
    )
  }
}

const invalidCondition = (message: string, path: string, details: Readonly<Record<string, unknown>>): CoreError =>
  createCoreError("resolve", {
    code: CoreErrorCodes.INVALID_CONDITION,
    message,
    path,
    details,
  })
