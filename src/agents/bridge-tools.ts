import {
  type AnyAgentTool,
  isToolName,
  type ToolDescriptor,
  type ToolName,
} from "./tools/common.js";
import {
  checkAvailabilityTool,
  createEventTool,
  deleteEventTool,
  findFreeSlotsTool,
  getScheduleTool,
} from "./tools/google-calendar-tool.js";
import {
  draftReplyTool,
  getEmailTool,
  listEmailsTool,
  searchEmailsTool,
  sendEmailTool,
} from "./tools/google-gmail-tool.js";

export const BRIDGE_TOOLS = {
  list_emails: listEmailsTool,
  get_email: getEmailTool,
  search_emails: searchEmailsTool,
  draft_reply: draftReplyTool,
  send_email: sendEmailTool,
  get_schedule: getScheduleTool,
  check_availability: checkAvailabilityTool,
  find_free_slots: findFreeSlotsTool,
  create_event: createEventTool,
  delete_event: deleteEventTool,
} satisfies Record<ToolName, AnyAgentTool>;

export function getBridgeTool(name: ToolName): AnyAgentTool {
  return BRIDGE_TOOLS[name];
}

/** Look up a tool by the name the agent runtime sent; unknown names yield undefined. */
export function findBridgeTool(name: string): AnyAgentTool | undefined {
  return isToolName(name) ? getBridgeTool(name) : undefined;
}

export function describeBridgeTools(): ToolDescriptor[] {
  return Object.values(BRIDGE_TOOLS).map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  }));
}
