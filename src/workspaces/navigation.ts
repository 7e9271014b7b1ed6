import { stat } from 'fs/promises';
import type { ContextResolver } from '../context/contextResolver.js';
import {
  DEFAULT_SUGGESTION_OPTIONS,
  type Context,
  type ResolutionResult,
  type ResolutionSuggestion,
  type SuggestionOptions,
} from '../context/types.js';
import { NotFoundError, ResolutionError } from '../errors.js';

export interface NavigationOptions {
  resolver: ContextResolver;
  /** 0 means unlimited */
  maxSuggestions: number;
}

/**
 * Resolution for `cd`: the target must exist on disk
 */
export class Navigator {
  private readonly resolver: ContextResolver;
  private readonly maxSuggestions: number;

  constructor(options: NavigationOptions) {
    this.resolver = options.resolver;
    this.maxSuggestions = options.maxSuggestions;
  }

  /**
   * @throws ResolutionError for an invalid identifier
   * @throws NotFoundError when the target directory does not exist
   */
  async resolvePath(context: Context, target: string): Promise<ResolutionResult> {
    const result = await this.resolver.resolveIdentifier(context, target);
    if (result.type === 'invalid') {
      throw new ResolutionError(target, context.path, result.explanation, {
        suggestions: ['main', '<branch>', '<project>', '<project>/<branch>'],
      });
    }

    let isDirectory = false;
    try {
      isDirectory = (await stat(result.resolvedPath)).isDirectory();
    } catch (err) {
      throw this.notFound(target, result, err);
    }
    if (!isDirectory) {
      throw this.notFound(target, result);
    }
    return result;
  }

  private notFound(target: string, result: ResolutionResult, cause?: unknown): NotFoundError {
    const suggestions =
      result.type === 'worktree' ? [`treehop create ${target}`] : ['Run `treehop list --all` to see projects'];
    return new NotFoundError(result.type, target, `${result.type} not found: ${result.resolvedPath}`, {
      suggestions,
      cause,
    });
  }

  async suggest(
    context: Context,
    partial: string,
    options: SuggestionOptions = DEFAULT_SUGGESTION_OPTIONS
  ): Promise<ResolutionSuggestion[]> {
    const suggestions = await this.resolver.getResolutionSuggestions(context, partial, options);
    return this.maxSuggestions > 0 ? suggestions.slice(0, this.maxSuggestions) : suggestions;
  }
}
