import * as readline from 'readline';
import { UserQuitError } from '../../errors/index.js';
import { completePath } from '../../utils/pathUtils.js';
import type { CatalogEntity } from '../../types/catalog.js';
import type { CandidateChooser } from '../matching/resolutionPolicy.js';

export interface ConsolePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const SKIP_CHOICE = 'Skip (do not select any match)';

export function formatCandidate(candidate: CatalogEntity): string {
  return `${candidate.title}  [${candidate.kind}]  (library: ${candidate.librarySectionTitle ?? ''})`;
}

/**
 * Terminal prompts for interactive runs. Typing `q` at a choice ends the run.
 * TAB completes paths when the output is a TTY.
 */
export class ConsolePrompter implements CandidateChooser {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;

  constructor(options: ConsolePrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      completer: completePath,
    });
  }

  private question(query: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const onClose = (): void => reject(new UserQuitError());
      this.rl.once('close', onClose);
      this.rl.question(query, answer => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }

  async askScanPath(): Promise<string> {
    const answer = await this.question('Enter path (directory) to operate on (TAB for autocompletion): ');
    return answer.trim();
  }

  /**
   * List the candidates plus a skip entry and wait for a valid number
   */
  async choose(searchTitle: string, candidates: readonly CatalogEntity[]): Promise<CatalogEntity | null> {
    if (candidates.length === 0) {
      return null;
    }

    const choices = [...candidates.map(formatCandidate), SKIP_CHOICE];

    this.print(`Multiple Plex matches found for '${searchTitle}'. Choose one:`);
    choices.forEach((choice, i) => this.print(`  ${i + 1}. ${choice}`));

    for (;;) {
      const answer = (await this.question("Choose number (or 'q' to quit): ")).trim();

      if (answer.toLowerCase() === 'q') {
        this.print('Quitting.');
        throw new UserQuitError();
      }

      if (/^\d+$/.test(answer)) {
        const index = parseInt(answer, 10) - 1;
        if (index >= 0 && index < candidates.length) {
          return candidates[index];
        }
        if (index === candidates.length) {
          return null;
        }
      }

      this.print('Invalid choice, try again.');
    }
  }

  close(): void {
    this.rl.close();
  }
}
