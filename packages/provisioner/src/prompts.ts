import * as p from "@clack/prompts"
import { password } from "@erpstack/env"
import { InstallerError, OperatorAbortError } from "./errors.js"

export interface Choice<T extends string> {
  value: T
  label: string
}

/**
 * Every question the installer asks goes through a Prompter. Automated and
 * quick runs get the AutoPrompter, which never reads stdin.
 */
export interface Prompter {
  readonly interactive: boolean
  confirm(question: string, defaultYes: boolean): Promise<boolean>
  input(question: string, defaultValue: string): Promise<string>
  secret(question: string): Promise<string>
  choose<T extends string>(question: string, choices: readonly Choice<T>[], defaultValue: T): Promise<T>
}

/**
 * Answers every gate with yes and every question with its default.
 */
export class AutoPrompter implements Prompter {
  readonly interactive = false

  async confirm(): Promise<boolean> {
    return true
  }

  async input(_question: string, defaultValue: string): Promise<string> {
    return defaultValue
  }

  async secret(question: string): Promise<string> {
    throw new InstallerError("INTERACTIVE_INPUT_REQUIRED", `Cannot ask "${question}" in a non-interactive run`)
  }

  async choose<T extends string>(_question: string, _choices: readonly Choice<T>[], defaultValue: T): Promise<T> {
    return defaultValue
  }
}

/** Cancelling any prompt (Ctrl-C) aborts the run */
function unwrap<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Installation cancelled")
    throw new OperatorAbortError()
  }
  return value
}

export class ClackPrompter implements Prompter {
  readonly interactive = true

  async confirm(question: string, defaultYes: boolean): Promise<boolean> {
    return unwrap(await p.confirm({ message: question, initialValue: defaultYes }))
  }

  async input(question: string, defaultValue: string): Promise<string> {
    const value = unwrap(await p.text({ message: question, placeholder: defaultValue, defaultValue }))
    return value.trim() || defaultValue
  }

  async secret(question: string): Promise<string> {
    return unwrap(
      await p.password({
        message: question,
        validate: value => {
          const checked = password.safeParse(value)
          return checked.success ? undefined : checked.error.issues[0]?.message
        },
      }),
    )
  }

  async choose<T extends string>(question: string, choices: readonly Choice<T>[], defaultValue: T): Promise<T> {
    const picked = unwrap(
      await p.select<{ value: string; label: string }[], string>({
        message: question,
        options: choices.map(choice => ({ value: choice.value, label: choice.label })),
        initialValue: defaultValue,
      }),
    )
    return choices.find(choice => choice.value === picked)?.value ?? defaultValue
  }
}
