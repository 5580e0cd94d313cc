/**
 * Key bindings of the terminal wizard
 * @module @faultline/cli/tui/keys
 */

import type { WizardController } from '@faultline/core';
import { containsControlCharacters } from '@faultline/shared';
import type { EditPrompt, ViewState } from './screens.js';

/**
 * Key press as emitted by readline's keypress events
 */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type WizardCommand = 'up' | 'down' | 'activate' | 'inject' | 'reset' | 'back' | 'quit' | 'help';

/**
 * Map a key to a wizard command
 */
export function resolveKey(key: KeyPress): WizardCommand | null {
  if (key.ctrl) {
    return key.name === 'c' ? 'quit' : null;
  }

  switch (key.name) {
    case 'up':
    case 'k':
      return 'up';
    case 'down':
    case 'j':
      return 'down';
    case 'return':
    case 'enter':
      return 'activate';
    case 'i':
      return 'inject';
    case 'r':
      return 'reset';
    case 'b':
    case 'escape':
      return 'back';
    case 'q':
      return 'quit';
    case 'h':
      return 'help';
  }
  return key.sequence === '?' ? 'help' : null;
}

/**
 * Turns key presses into controller calls and holds the view state
 * (open edit prompt, help panel)
 */
export class WizardInput {
  readonly view: ViewState = { prompt: null, showHelp: false };

  constructor(private readonly controller: WizardController) {}

  handle(key: KeyPress): void {
    if (this.view.prompt) {
      this.handlePrompt(this.view.prompt, key);
      return;
    }

    switch (resolveKey(key)) {
      case 'up':
        this.controller.select(-1);
        break;
      case 'down':
        this.controller.select(1);
        break;
      case 'activate': {
        const result = this.controller.activate();
        if (result.type === 'edit-field') {
          this.view.prompt = { field: result.field, buffer: result.current };
        } else if (result.type === 'session-started') {
          this.view.showHelp = false;
        }
        break;
      }
      case 'inject':
        this.controller.inject();
        break;
      case 'reset':
        this.controller.resetSelectedField();
        break;
      case 'back':
        this.controller.back();
        break;
      case 'quit':
        this.controller.quit();
        break;
      case 'help':
        if (this.controller.store.screen.value.kind === 'selecting') {
          this.view.showHelp = !this.view.showHelp;
        }
        break;
      case null:
        break;
    }
  }

  private handlePrompt(prompt: EditPrompt, key: KeyPress): void {
    if (key.ctrl) {
      if (key.name === 'c') this.view.prompt = null;
      return;
    }

    switch (key.name) {
      case 'escape':
        this.view.prompt = null;
        return;
      case 'return':
      case 'enter': {
        // A rejected value keeps the prompt open; the notice says why
        const result = this.controller.submitEdit(prompt.buffer);
        if (!result || result.valid) {
          this.view.prompt = null;
        }
        return;
      }
      case 'backspace':
        prompt.buffer = prompt.buffer.slice(0, -1);
        return;
      case 'up':
      case 'down':
        this.cycleOption(prompt, key.name === 'up' ? -1 : 1);
        return;
    }

    const text = key.sequence ?? '';
    if (!key.meta && text.length > 0 && !containsControlCharacters(text)) {
      prompt.buffer += text;
    }
  }

  private cycleOption(prompt: EditPrompt, delta: number): void {
    const options = prompt.field.options;
    if (prompt.field.kind !== 'enumerated' || !options || options.length === 0) {
      return;
    }
    const index = options.indexOf(prompt.buffer);
    const start = index === -1 ? (delta > 0 ? -1 : 0) : index;
    const next = options[(((start + delta) % options.length) + options.length) % options.length];
    if (next !== undefined) {
      prompt.buffer = next;
    }
  }
}
