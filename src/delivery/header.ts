export interface MessageHeader {
  readonly from: string;
  readonly subject: string;
  readonly mime: string;
  readonly miscellaneous: string;
}

// The To line is per recipient, so the header is re-rendered for every delivery.
export function formatHeader(header: MessageHeader, to: string): string {
  return `From: ${header.from}\nTo: ${to}\nSubject: ${header.subject}\n${header.mime}\n${header.miscellaneous}\n`;
}

export function buildMessage(header: MessageHeader, to: string, body: string): string {
  return formatHeader(header, to) + body;
}
