// email-reply-parser publishes no type declarations and has no @types package.
declare module 'email-reply-parser' {
  interface ParsedEmail {
    getVisibleText(): string;
  }

  export default class EmailReplyParser {
    read(text: string): ParsedEmail;
  }
}
