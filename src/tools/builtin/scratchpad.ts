/**
 * Scratchpad Tools
 */

import { z } from 'zod';
import type { ScratchpadStore } from '../../services/scratchpad.js';
import { defineTool, type RegisteredTool } from '../registry.js';

export const UpdateScratchpadInputSchema = z.object({
  content: z.string().describe('The new content to save to the scratchpad'),
  append: z
    .boolean()
    .optional()
    .describe('Whether to append to existing content (true) or replace it (false). Default is false'),
});

export function createScratchpadTools(scratchpad: ScratchpadStore): RegisteredTool[] {
  return [
    defineTool({
      name: 'getScratchpad',
      description: "Gets the current contents of the user's scratchpad notes",
      args: z.object({}),
      run: async () => {
        const notes = await scratchpad.get();
        return notes.trim() === '' ? 'Your scratchpad is currently empty.' : `Your scratchpad contents:\n\n${notes}`;
      },
    }),

    defineTool({
      name: 'updateScratchpad',
      description: "Updates the contents of the user's scratchpad notes",
      args: UpdateScratchpadInputSchema,
      run: async ({ content, append }) => {
        if (append) {
          const existing = await scratchpad.get();
          await scratchpad.set(existing === '' ? content : `${existing}\n\n${content}`);
          return 'Scratchpad appended to successfully.';
        }
        await scratchpad.set(content);
        return 'Scratchpad updated successfully.';
      },
    }),
  ];
}
