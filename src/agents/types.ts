import type { AssetBase } from '../corpus/types.js';
import type { ToolPermission } from '../tools/permissions.js';

/**
 * Agent persona the host can hand a sub-task to. The body is the system
 * prompt; `tools` restricts what the sub-agent may call.
 */
export interface AgentDefinition extends AssetBase {
    kind: 'agent';
    /** 'all' when the frontmatter omits `tools` */
    tools: ToolPermission[] | 'all';
    model?: string;
    color?: string;
    prompt: string;
}

export const AGENT_KEYS = ['name', 'description', 'tools', 'model', 'color'] as const;
