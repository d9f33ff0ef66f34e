import * as z from "zod/v4";
import { MAX_SCORE, MIN_SCORE, type CrmConnector } from "../connectors/crm-connector.js";
import { isIdentifier } from "../connectors/query-language.js";
import { defineTool, missingIdFailure, readRecordId, toolFailure, type RegisteredTool } from "./types.js";

export function createCrmTools(crm: CrmConnector): RegisteredTool[] {
  return [
    defineTool({
      name: "crm_query_contact",
      title: "Look up CRM contact",
      description: "Fetch a CRM contact by email, including its lead score.",
      input: z.object({ email: z.email() }),
      handler: async ({ email }) => {
        const result = await crm.retrieveByEmail(email);
        if (!result.ok) {
          return toolFailure(result.error);
        }
        return {
          status: "success",
          email,
          leadScore: result.value[crm.scoreField] ?? null,
          contact: result.value
        };
      }
    }),

    defineTool({
      name: "crm_update_lead_score",
      title: "Update CRM lead score",
      description: `Set the lead score of a CRM contact, found by email. The score must be an integer from ${MIN_SCORE} to ${MAX_SCORE}.`,
      input: z.object({ email: z.email(), newScore: z.number().int() }),
      handler: async ({ email, newScore }) => {
        if (newScore < MIN_SCORE || newScore > MAX_SCORE) {
          return {
            status: "error",
            message: `Invalid score ${newScore}: must be between ${MIN_SCORE} and ${MAX_SCORE}.`,
            errorKind: "invalid_input",
            code: "invalid_score",
            httpStatus: null
          };
        }
        const contact = await crm.retrieveByEmail(email);
        if (!contact.ok) {
          return toolFailure(contact.error);
        }
        const contactId = readRecordId(contact.value);
        if (!contactId) {
          return missingIdFailure("CRM");
        }
        const updated = await crm.updateScore(contactId, newScore);
        if (!updated.ok) {
          return toolFailure(updated.error);
        }
        return {
          status: "success",
          email,
          contactId,
          oldScore: contact.value[crm.scoreField] ?? null,
          newScore,
          message: `Lead score for ${email} updated to ${newScore}.`
        };
      }
    }),

    defineTool({
      name: "crm_list_records",
      title: "List CRM records",
      description: "Fetch every record of a CRM module, page by page.",
      input: z.object({ module: z.string().default("Contacts") }),
      handler: async ({ module }) => {
        if (!isIdentifier(module)) {
          return {
            status: "error",
            message: `Invalid CRM module name: ${module}`,
            errorKind: "invalid_input",
            code: "invalid_module",
            httpStatus: null
          };
        }
        const result = await crm.queryAll(`SELECT * FROM ${module};`);
        if (!result.ok) {
          return toolFailure(result.error);
        }
        return {
          status: "success",
          module,
          count: result.value.length,
          records: result.value
        };
      }
    })
  ];
}
