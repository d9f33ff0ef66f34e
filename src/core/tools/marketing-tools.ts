import * as z from "zod/v4";
import type { MarketingConnector } from "../connectors/marketing-connector.js";
import { defineTool, missingIdFailure, readRecordId, toolFailure, type RegisteredTool } from "./types.js";

export function createMarketingTools(marketing: MarketingConnector): RegisteredTool[] {
  return [
    defineTool({
      name: "marketing_get_segments",
      title: "Get marketing segments",
      description: "List the marketing segments a contact, found by email, belongs to.",
      input: z.object({ email: z.email() }),
      handler: async ({ email }) => {
        const contact = await marketing.getContactByEmail(email);
        if (!contact.ok) {
          return toolFailure(contact.error);
        }
        const contactId = readRecordId(contact.value);
        if (!contactId) {
          return missingIdFailure("marketing");
        }
        const segments = await marketing.getContactSegments(contactId);
        if (!segments.ok) {
          return toolFailure(segments.error);
        }
        return {
          status: "success",
          email,
          contactId,
          segments: segments.value
            .map((segment) => segment.name)
            .filter((name): name is string => typeof name === "string")
        };
      }
    }),

    defineTool({
      name: "marketing_add_tag",
      title: "Tag marketing contact",
      description: "Attach a tag to a marketing contact, found by email.",
      input: z.object({ email: z.email(), tag: z.string().trim().min(1) }),
      handler: async ({ email, tag }) => {
        const contact = await marketing.getContactByEmail(email);
        if (!contact.ok) {
          return toolFailure(contact.error);
        }
        const contactId = readRecordId(contact.value);
        if (!contactId) {
          return missingIdFailure("marketing");
        }
        const tagged = await marketing.addTagToContact(contactId, tag);
        if (!tagged.ok) {
          return toolFailure(tagged.error);
        }
        return {
          status: "success",
          email,
          contactId,
          tagAdded: tag,
          message: `Tag '${tag}' added to ${email}.`
        };
      }
    }),

    defineTool({
      name: "marketing_list_contacts",
      title: "List marketing contacts",
      description: "Fetch every marketing contact, page by page.",
      input: z.object({}),
      handler: async () => {
        const result = await marketing.listAllContacts();
        if (!result.ok) {
          return toolFailure(result.error);
        }
        return {
          status: "success",
          count: result.value.length,
          contacts: result.value
        };
      }
    })
  ];
}
