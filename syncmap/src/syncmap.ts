import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { PARAM_SYNCMAP_LANGUAGE } from './config.js';
import { createSyncMapContext } from './context.js';
import {
  FragmentTypeError,
  InvalidArgumentError,
  MissingParameterError,
  PermissionError,
} from './errors.js';
import { ensureParentDirectory, fileCanBeRead, fileCanBeWritten, fixSlash } from './files.js';
import { SyncMapFragment } from './fragment.js';
import { timeToSsmmm } from './time.js';
import { Tree } from './tree.js';
import { renderTuningPage } from './tuning.js';
import type {
  SyncMapCodec,
  SyncMapContext,
  SyncMapFormat,
  SyncMapJsonDocument,
  SyncMapJsonFragment,
  SyncMapParameters,
} from './types.js';

/**
 * A synchronization map: a tree of fragments, each pairing text with a time interval.
 *
 * The root of the tree carries no fragment. Sibling order is document order.
 */
export class SyncMap {
  private tree = new Tree<SyncMapFragment>();

  constructor(private readonly context: SyncMapContext = createSyncMapContext()) {}

  get fragmentsTree(): Tree<SyncMapFragment> {
    return this.tree;
  }

  /**
   * The fragments attached (directly, or through valueless nodes) to the root.
   * Recomputed on every access.
   */
  get fragments(): SyncMapFragment[] {
    return this.tree.vchildrenNotEmpty;
  }

  get length(): number {
    return this.fragments.length;
  }

  /**
   * True if the map is a flat list of fragments rather than a hierarchy
   */
  get isSingleLevel(): boolean {
    return this.tree.height <= 2;
  }

  /**
   * Add a fragment as the last (or first) child of the root
   */
  addFragment(fragment: SyncMapFragment, asLast = true): void {
    if (!(fragment instanceof SyncMapFragment)) {
      throw this.logged(new FragmentTypeError());
    }
    this.tree.addChild(new Tree(fragment), asLast);
  }

  clear(): void {
    this.context.logger.debug('Clearing sync map');
    this.tree = new Tree<SyncMapFragment>();
  }

  toJSON(): SyncMapJsonDocument {
    return { fragments: projectChildren(this.tree) };
  }

  /**
   * JSON projection of the tree: sorted keys, one-space indentation, times as "SS.mmm"
   */
  get jsonString(): string {
    return JSON.stringify(this.toJSON(), null, 1);
  }

  /**
   * Read fragments from `inputFilePath` in the given format and add them to this map.
   *
   * If `parameters.language` is set, every fragment gets that language afterwards.
   * A codec failing halfway leaves the fragments it already added.
   */
  read(format: string | undefined, inputFilePath: string, parameters: SyncMapParameters = {}): void {
    const variant = this.checkFormat(format);
    if (!fileCanBeRead(inputFilePath)) {
      throw this.logged(
        new PermissionError(
          `Cannot read sync map file '${inputFilePath}'. Wrong permissions?`,
          inputFilePath,
        ),
      );
    }

    const { logger } = this.context;
    logger.debug(`Input format:     '${variant}'`);
    logger.debug(`Input path:       '${inputFilePath}'`);
    logger.debug(`Input parameters: ${JSON.stringify(parameters)}`);

    const reader = this.createCodec(variant, parameters);
    if (!reader.parse) {
      throw this.logged(new InvalidArgumentError(`Sync map format '${variant}' cannot be read`));
    }

    logger.debug('Reading input file...');
    const inputText = readFileSync(inputFilePath, 'utf-8');
    reader.parse(inputText, this);
    logger.debug('Reading input file... done');

    const language = parameters[PARAM_SYNCMAP_LANGUAGE];
    if (language !== undefined) {
      logger.debug(`Overwriting language to '${language}'`);
      for (const node of this.tree.preOrder()) {
        if (node.value) {
          node.value.textFragment.language = language;
        }
      }
    }
  }

  /**
   * Write this map to `outputFilePath` in the given format, creating parent
   * directories as needed.
   */
  write(format: string | undefined, outputFilePath: string, parameters: SyncMapParameters = {}): void {
    const variant = this.checkFormat(format);
    this.checkWritable(outputFilePath, 'sync map');

    const { logger } = this.context;
    logger.debug(`Output format:     '${variant}'`);
    logger.debug(`Output path:       '${outputFilePath}'`);
    logger.debug(`Output parameters: ${JSON.stringify(parameters)}`);

    const writer = this.createCodec(variant, parameters);
    if (!writer.format) {
      throw this.logged(new InvalidArgumentError(`Sync map format '${variant}' cannot be written`));
    }

    const outputText = writer.format(this);

    ensureParentDirectory(outputFilePath);
    logger.debug('Writing output file...');
    writeFileSync(outputFilePath, outputText, 'utf-8');
    logger.debug('Writing output file... done');
  }

  /**
   * Write a self-contained HTML page for fine tuning this map against `audioFilePath`.
   *
   * Recognized parameters: the output format preselected in the page and,
   * for SMIL, the audio and page references.
   */
  outputHtmlForTuning(
    audioFilePath: string,
    outputFilePath: string,
    parameters: SyncMapParameters = {},
  ): void {
    this.checkWritable(outputFilePath, 'HTML');

    const { config, logger } = this.context;
    logger.debug(`Reading tuning template '${config.tuningTemplatePath}'`);
    const template = readFileSync(config.tuningTemplatePath, 'utf-8');

    const page = renderTuningPage(template, {
      audioFilePath: fixSlash(resolve(audioFilePath)),
      json: this.jsonString,
      parameters,
    });

    ensureParentDirectory(outputFilePath);
    writeFileSync(outputFilePath, page, 'utf-8');
    logger.debug(`Tuning page written to '${outputFilePath}'`);
  }

  toString(): string {
    return this.fragments.map((fragment) => fragment.toString()).join('\n');
  }

  private checkFormat(format: string | undefined): SyncMapFormat {
    if (!format) {
      throw this.logged(new InvalidArgumentError('Sync map format is missing'));
    }
    if (!this.context.registry.has(format)) {
      throw this.logged(new InvalidArgumentError(`Sync map format '${format}' is not allowed`));
    }
    return format;
  }

  private checkWritable(outputFilePath: string, kind: string): void {
    if (!fileCanBeWritten(outputFilePath)) {
      throw this.logged(
        new PermissionError(
          `Cannot write ${kind} file '${outputFilePath}'. Wrong permissions?`,
          outputFilePath,
        ),
      );
    }
  }

  private createCodec(variant: SyncMapFormat, parameters: SyncMapParameters): SyncMapCodec {
    const { config, logger, registry } = this.context;
    const result = registry.create({ variant, parameters, config, logger });
    if (!result.ok) {
      throw this.logged(new MissingParameterError(variant, result.missingParameters));
    }
    return result.codec;
  }

  private logged<E extends Error>(error: E): E {
    this.context.logger.debug(`${error.name}: ${error.message}`);
    return error;
  }
}

function projectChildren(node: Tree<SyncMapFragment>): SyncMapJsonFragment[] {
  const output: SyncMapJsonFragment[] = [];
  for (const child of node.childrenNotEmpty) {
    const fragment = child.value;
    if (!fragment) {
      continue;
    }
    const text = fragment.textFragment;
    output.push({
      begin: timeToSsmmm(fragment.begin),
      children: projectChildren(child),
      end: timeToSsmmm(fragment.end),
      id: text.identifier,
      language: text.language,
      lines: [...text.lines],
    });
  }
  return output;
}
