import type { ToolDescriptor } from '@strand/ai'
import type { GenericSchema } from 'valibot'
import type { AgentTool } from './types'

/**
 * Identity helper that infers `params` from the schema:
 *
 * ```ts
 * const weather = defineTool({
 *   name: 'get_weather',
 *   description: 'Current weather for a city',
 *   parameters: v.object({ city: v.string() }),
 *   execute: async (_id, { city }) => ({ content: `Sunny in ${city}` })
 * })
 * ```
 */
export function defineTool<TParameters extends GenericSchema>(
	tool: AgentTool<TParameters>
): AgentTool<TParameters> {
	return tool
}

/** Index tools by name. Names must be unique within a run. */
export function indexTools(tools: readonly AgentTool[]): ReadonlyMap<string, AgentTool> {
	const byName = new Map<string, AgentTool>()
	for (const tool of tools) {
		if (byName.has(tool.name)) {
			throw new Error(`Duplicate tool name: ${tool.name}`)
		}
		byName.set(tool.name, tool)
	}
	return byName
}

export function toToolDescriptors(tools: Iterable<AgentTool>): ToolDescriptor[] {
	return Array.from(tools, ({ name, description, parameters }) => ({ name, description, parameters }))
}
