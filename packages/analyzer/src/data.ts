import fs from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = join(__dirname, '..', 'data');

export const lexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
  negators: z.array(z.string().min(1)),
});

export type SentimentLexicon = z.infer<typeof lexiconSchema>;

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(join(DATA_DIR, file), 'utf-8'));
}

let lexicon: SentimentLexicon | undefined;
let stopWords: readonly string[] | undefined;

/** Built-in Chinese/English lexicon from data/sentiment-lexicon.json */
export function defaultLexicon(): SentimentLexicon {
  lexicon ??= lexiconSchema.parse(readJson('sentiment-lexicon.json'));
  return lexicon;
}

/** Built-in stop words from data/stopwords.json, lowercased */
export function defaultStopWords(): readonly string[] {
  stopWords ??= z
    .array(z.string())
    .parse(readJson('stopwords.json'))
    .map((w) => w.toLowerCase());
  return stopWords;
}
