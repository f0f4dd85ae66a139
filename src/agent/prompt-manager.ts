import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../observability/logger';
import { languageName } from '../config/languages';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful campus assistant. Answer student questions using the knowledge base provided. ' +
  'Reply with a JSON object: {"answer": string, "intent": string | null, "suggested_questions": string[]}.';

const DEFAULT_TRANSLATION_PROMPT =
  'Translate the user message from {{source}} to {{target}}. Reply with the translation only.';

/**
 * Loads the system and translation prompts from `prompts/`.
 * A missing file falls back to a built-in default.
 */
export class PromptManager {
  private systemPrompt = DEFAULT_SYSTEM_PROMPT;
  private translationTemplate = DEFAULT_TRANSLATION_PROMPT;
  private log = logger.child({ component: 'prompt-manager' });

  constructor(private readonly dir: string = PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.systemPrompt = this.readPromptFile('system.md') ?? DEFAULT_SYSTEM_PROMPT;
    this.translationTemplate = this.readPromptFile('translation.md') ?? DEFAULT_TRANSLATION_PROMPT;
  }

  private readPromptFile(filename: string): string | null {
    const filepath = path.join(this.dir, filename);
    if (!fs.existsSync(filepath)) {
      this.log.warn({ filepath }, 'Prompt file not found; using default');
      return null;
    }
    const content = fs.readFileSync(filepath, 'utf-8').trim();
    return content || null;
  }

  get system(): string {
    return this.systemPrompt;
  }

  translation(source: string, target: string): string {
    return this.translationTemplate
      .replace(/\{\{source\}\}/g, languageName(source))
      .replace(/\{\{target\}\}/g, languageName(target));
  }
}
