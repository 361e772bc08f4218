import { Agent } from '../agent/agent'
import type { AgentConfig } from '../types'
import type { AppConfig } from '../config/config'

/**
 * Creates an agent from a configuration object.
 *
 * Pass the loaded `AppConfig` as `settings` to take `maxTurns` from it;
 * an explicit `config.maxTurns` wins.
 */
export function createAgent(config: AgentConfig, settings?: Pick<AppConfig, 'maxTurns'>): Agent {
    return new Agent({ ...config, maxTurns: config.maxTurns ?? settings?.maxTurns })
}
