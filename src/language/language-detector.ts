import * as fs from 'fs';
import * as path from 'path';
import { DetectionAmbiguousError } from '../resilience/errors';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const MARKERS_FILE = path.join(PROJECT_ROOT, 'data', 'language-markers.json');

export interface DetectionResult {
  language: string;
  confidence: number;
}

export interface LanguageDetectorOptions {
  /** Below this confidence detection is ambiguous */
  confidenceFloor: number;
  /** Fewer letters than this is too short to classify */
  minLetters: number;
}

export interface LanguageMarkers {
  /** Romanized Hindi words */
  hinglish: string[];
  marathi: string[];
  hindi: string[];
}

/** Share of Latin words that must be romanized Hindi to classify as `hi` */
const HINGLISH_MARKER_RATIO = 0.3;
const HINGLISH_CONFIDENCE_SCALE = 0.8;
const ENGLISH_CONFIDENCE_SCALE = 0.9;

type Script =
  | 'latin' | 'devanagari' | 'bengali' | 'gurmukhi' | 'gujarati'
  | 'odia' | 'tamil' | 'telugu' | 'kannada' | 'malayalam' | 'other';

const SCRIPT_RANGES: Array<{ script: Script; from: number; to: number }> = [
  { script: 'devanagari', from: 0x0900, to: 0x097f },
  { script: 'bengali', from: 0x0980, to: 0x09ff },
  { script: 'gurmukhi', from: 0x0a00, to: 0x0a7f },
  { script: 'gujarati', from: 0x0a80, to: 0x0aff },
  { script: 'odia', from: 0x0b00, to: 0x0b7f },
  { script: 'tamil', from: 0x0b80, to: 0x0bff },
  { script: 'telugu', from: 0x0c00, to: 0x0c7f },
  { script: 'kannada', from: 0x0c80, to: 0x0cff },
  { script: 'malayalam', from: 0x0d00, to: 0x0d7f },
  { script: 'latin', from: 0x0041, to: 0x024f },
];

const SCRIPT_LANGUAGE: Partial<Record<Script, string>> = {
  bengali: 'bn',
  gurmukhi: 'pa',
  gujarati: 'gu',
  odia: 'or',
  tamil: 'ta',
  telugu: 'te',
  kannada: 'kn',
  malayalam: 'ml',
};

const LETTER = /[\p{L}\p{M}]/u;

function scriptOf(char: string): Script {
  const code = char.codePointAt(0) ?? 0;
  for (const range of SCRIPT_RANGES) {
    if (code >= range.from && code <= range.to) return range.script;
  }
  return 'other';
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function loadLanguageMarkers(file: string = MARKERS_FILE): LanguageMarkers {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Invalid language marker file: ${file}`);
  }
  return {
    hinglish: 'hinglish' in parsed ? stringList(parsed.hinglish) : [],
    marathi: 'marathi' in parsed ? stringList(parsed.marathi) : [],
    hindi: 'hindi' in parsed ? stringList(parsed.hindi) : [],
  };
}

function words(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{M}]+/u).filter(Boolean);
}

/**
 * Script-based language detection.
 *
 * The dominant Unicode script decides the language. Devanagari is split into
 * Hindi and Marathi by marker words, and Latin text heavy with romanized
 * Hindi is classified as Hindi. Confidence is the dominant script's share of
 * letters, scaled down for the Latin guesses.
 */
export class LanguageDetector {
  private readonly hinglish: Set<string>;
  private readonly marathi: Set<string>;
  private readonly hindi: Set<string>;

  constructor(
    private readonly options: LanguageDetectorOptions,
    markers: LanguageMarkers = loadLanguageMarkers(),
  ) {
    this.hinglish = new Set(markers.hinglish);
    this.marathi = new Set(markers.marathi);
    this.hindi = new Set(markers.hindi);
  }

  detect(text: string): DetectionResult {
    const counts = new Map<Script, number>();
    let letters = 0;
    for (const char of text) {
      if (!LETTER.test(char)) continue;
      letters++;
      const script = scriptOf(char);
      counts.set(script, (counts.get(script) ?? 0) + 1);
    }

    if (letters < Math.max(1, this.options.minLetters)) {
      throw new DetectionAmbiguousError(`Too little text to detect language (${letters} letters)`);
    }

    let dominant: Script = 'other';
    let dominantCount = 0;
    for (const [script, count] of counts) {
      if (count > dominantCount) {
        dominant = script;
        dominantCount = count;
      }
    }
    const ratio = dominantCount / letters;

    const result = this.classify(dominant, ratio, words(text));
    if (!result) {
      throw new DetectionAmbiguousError('Text is not in a recognised script');
    }
    if (result.confidence < this.options.confidenceFloor) {
      throw new DetectionAmbiguousError(
        `Detection confidence ${result.confidence.toFixed(2)} for "${result.language}" is below the floor`,
      );
    }
    return result;
  }

  private classify(script: Script, ratio: number, tokens: string[]): DetectionResult | null {
    switch (script) {
      case 'latin': {
        const latinWords = tokens.filter((w) => scriptOf(w) === 'latin');
        const markers = latinWords.filter((w) => this.hinglish.has(w)).length;
        if (latinWords.length > 0 && markers / latinWords.length >= HINGLISH_MARKER_RATIO) {
          return { language: 'hi', confidence: ratio * HINGLISH_CONFIDENCE_SCALE };
        }
        return { language: 'en', confidence: ratio * ENGLISH_CONFIDENCE_SCALE };
      }
      case 'devanagari': {
        const marathiHits = tokens.filter((w) => this.marathi.has(w)).length;
        const hindiHits = tokens.filter((w) => this.hindi.has(w)).length;
        return { language: marathiHits > hindiHits ? 'mr' : 'hi', confidence: ratio };
      }
      case 'other':
        return null;
      default: {
        const language = SCRIPT_LANGUAGE[script];
        return language ? { language, confidence: ratio } : null;
      }
    }
  }
}
