import type { ContentPart, MessageContent } from './types.js';

/**
 * Plain text of a message, with attachments shown as short markers
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => {
      switch (part.type) {
        case 'text':
          return part.text;
        case 'image_url':
          return part.image_url.url.startsWith('data:') ? '[image]' : `[image: ${part.image_url.url}]`;
        case 'file':
          return `[file: ${part.file.filename}]`;
      }
    })
    .join('\n');
}

/**
 * Replace inline base64 attachments with text markers so they are not
 * written into chat files.
 */
export function stripInlineData(content: MessageContent): MessageContent {
  if (typeof content === 'string') return content;
  return content.map((part): ContentPart => {
    if (part.type === 'image_url' && part.image_url.url.startsWith('data:')) {
      return { type: 'text', text: '[image]' };
    }
    if (part.type === 'file' && part.file.file_data.startsWith('data:')) {
      return { type: 'text', text: `[file: ${part.file.filename}]` };
    }
    return part;
  });
}
