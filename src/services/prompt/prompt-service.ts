/**
 * Interactive Prompt Service
 *
 * Asks for slot values the caller did not supply, with TTY detection and
 * the same validation the renderer applies.
 */

import inquirer from 'inquirer';
import type { InputSlot, PromptTemplate } from '../../models/template.js';
import { slotValue, validateSlotValue, type SlotInput } from '../template/renderer.js';

/**
 * Options for prompting behavior
 */
export interface PromptOptions {
  /** Ask for every slot not supplied, not only the required ones */
  all?: boolean;
  /** Values offered as the answer's default (e.g. from config.yaml) */
  defaults?: SlotInput;
}

/**
 * Error thrown when interactive mode is required but not available
 */
export class InteractiveError extends Error {
  readonly code = 'INTERACTIVE_ERROR';
  readonly missingSlots: string[];

  constructor(missingSlots: string[]) {
    super(
      `Interactive mode required but terminal does not support TTY input.\n` +
      `Missing required slots: ${missingSlots.join(', ')}\n` +
      `Please provide them with --set name=value or --slot-file name=path.`
    );
    this.name = 'InteractiveError';
    this.missingSlots = missingSlots;
  }
}

/**
 * Prompt Service Interface
 */
export interface IPromptService {
  isInteractive(): boolean;
  getMissingSlots(template: Pick<PromptTemplate, 'inputSlots'>, provided: SlotInput): string[];
  promptForMissingSlots(template: Pick<PromptTemplate, 'inputSlots'>, provided: SlotInput, options?: PromptOptions): Promise<SlotInput>;
  promptForConfirmation(message: string): Promise<boolean>;
}

function isMissing(value: string | number | undefined): boolean {
  return value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Prompt Service Implementation
 */
export class PromptService implements IPromptService {
  /**
   * Check if the terminal supports interactive input
   */
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  /**
   * Required slots with no value or a blank one, in declaration order
   */
  getMissingSlots(template: Pick<PromptTemplate, 'inputSlots'>, provided: SlotInput): string[] {
    return template.inputSlots
      .filter(slot => slot.required && isMissing(slotValue(provided, slot.name)))
      .map(slot => slot.name);
  }

  /**
   * Prompt for slots the caller left out
   *
   * @returns The provided values merged with the answers
   * @throws InteractiveError if TTY not available and required slots are missing
   */
  async promptForMissingSlots(
    template: Pick<PromptTemplate, 'inputSlots'>,
    provided: SlotInput,
    options: PromptOptions = {}
  ): Promise<SlotInput> {
    const missing = this.getMissingSlots(template, provided);
    const toAsk = options.all
      ? template.inputSlots.filter(slot => isMissing(slotValue(provided, slot.name)))
      : template.inputSlots.filter(slot => missing.includes(slot.name));

    if (toAsk.length === 0) {
      return { ...provided };
    }

    if (!this.isInteractive()) {
      if (missing.length > 0) {
        throw new InteractiveError(missing);
      }
      return { ...provided };
    }

    const result: SlotInput = { ...provided };
    for (const slot of toAsk) {
      result[slot.name] = await this.askSlot(slot, slotValue(options.defaults, slot.name) ?? slot.default);
    }
    return result;
  }

  private async askSlot(slot: InputSlot, fallback: string | number | undefined): Promise<string> {
    const message = `${slot.description} (${slot.name}):`;

    if (slot.type === 'enum') {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'list',
          name: 'value',
          message,
          choices: slot.values ?? [],
          default: fallback === undefined ? undefined : String(fallback)
        }
      ]);
      return value;
    }

    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message,
        default: fallback === undefined ? undefined : String(fallback),
        validate: (input: string) => {
          if (input.trim() === '') {
            return slot.required ? `${slot.name} is required` : true;
          }
          const checked = validateSlotValue(slot, input);
          return checked.ok || checked.message;
        }
      }
    ]);
    return value;
  }

  /**
   * Prompt for confirmation
   */
  async promptForConfirmation(message: string): Promise<boolean> {
    if (!this.isInteractive()) {
      // Without a TTY nothing is confirmed
      return false;
    }

    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: false
      }
    ]);

    return confirmed;
  }
}
