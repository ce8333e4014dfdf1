/**
 * Process Plugin
 *
 * Runs the definition's executable directly with its expanded arguments.
 * The health command, when set, is run the same way.
 */

import { expand, expandList } from './template';
import { PluginWorker } from './plugin-worker';
import type { LaunchSpec } from './child-process';
import type { PluginContext, PluginType } from './types';

export class ProcessPlugin extends PluginWorker {
  get type(): PluginType {
    return 'process';
  }

  protected resolveLaunch(context: PluginContext): LaunchSpec {
    return {
      command: expand(this.definition.executable, context),
      args: expandList(this.definition.arguments, context),
      ...this.baseSpec(context),
    };
  }

  protected resolveHealthProbe(context: PluginContext): LaunchSpec | null {
    const health = this.expandedHealthCommand(context);
    if (!health) return null;
    return { ...health, ...this.baseSpec(context) };
  }
}
