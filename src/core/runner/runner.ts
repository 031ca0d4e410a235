/**
 * One ade invocation: load the template, resolve the path, then parse or
 * create. The runner walks `unresolved → template_loaded → path_resolved`
 * and ends in `success` or `failed`; it cannot be run twice.
 */
import * as path from 'node:path';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { TemplateRegistry } from '../template/registry.js';
import { flattenTemplate } from '../template/resolve.js';
import type { ResolvedEntry } from '../template/types.js';
import { relativeSegments } from '../mount/resolver.js';
import { TreeParser, type ParseOptions } from '../parser/engine.js';
import { TreeSynthesizer } from '../synthesizer/engine.js';
import type {
  CreateOutcome,
  CreateRequest,
  ParseOutcome,
  RunOutcome,
  RunSettings,
  RunStage,
} from './types.js';

const log = logger.child('run');

export class AdeRunner {
  private current: RunStage = 'unresolved';
  private readonly history: RunStage[] = ['unresolved'];

  constructor(private readonly settings: RunSettings) {}

  get stage(): RunStage {
    return this.current;
  }

  /** Stages visited so far, in order. */
  get stages(): readonly RunStage[] {
    return this.history;
  }

  /**
   * Parse `target` (default: the working directory) against the template.
   */
  async parse(target?: string, options: ParseOptions = {}): Promise<RunOutcome<ParseOutcome>> {
    return this.execute(async () => {
      const entries = await this.loadTemplate();

      const absolute = path.resolve(this.settings.cwd, target ?? this.settings.cwd);
      const segments = relativeSegments(absolute, this.settings.mountPoint, this.settings.cwd);
      this.advance('path_resolved');
      log.debug(`Parsing ${segments.join('/')} against ${this.settings.template}`);

      const parser = new TreeParser(this.settings.patterns);
      const matches = parser.parseSegments(segments, entries, this.settings.template, options);
      return {
        template: this.settings.template,
        mountPoint: this.settings.mountPoint,
        target: absolute,
        segments,
        matches,
      };
    });
  }

  /**
   * Create the template at the mount point with the given values.
   */
  async create(request: CreateRequest): Promise<RunOutcome<CreateOutcome>> {
    return this.execute(async () => {
      const entries = await this.loadTemplate();

      const root = path.resolve(this.settings.cwd, this.settings.mountPoint);
      this.advance('path_resolved');
      log.debug(`Creating ${this.settings.template} in ${root}`);

      const synthesizer = new TreeSynthesizer();
      const result = await synthesizer.synthesize(entries, root, request.data, {
        patterns: this.settings.patterns,
        overwrite: request.overwrite,
        applyPermissions: request.applyPermissions,
        dryRun: request.dryRun,
      });
      return { ...result, template: this.settings.template, root };
    });
  }

  private async loadTemplate(): Promise<ResolvedEntry[]> {
    const registry = await TemplateRegistry.load(this.settings.templateFolder, {
      ignore: this.settings.ignore,
    });
    const template = registry.resolveTemplate(this.settings.template);
    this.advance('template_loaded');
    return flattenTemplate(template);
  }

  private advance(stage: RunStage): void {
    this.current = stage;
    this.history.push(stage);
  }

  private async execute<T>(work: () => Promise<T>): Promise<RunOutcome<T>> {
    if (this.current !== 'unresolved') {
      throw new Error(`Runner already used (stage: ${this.current})`);
    }
    try {
      const result = await work();
      this.advance('success');
      return { status: 'success', result };
    } catch (error) {
      const stage = this.current;
      this.advance('failed');
      log.debug(`Failed during ${stage}: ${errorMessage(error)}`);
      return {
        status: 'failed',
        error: error instanceof Error ? error : new Error(String(error)),
        stage,
      };
    }
  }
}
