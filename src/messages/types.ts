/** A chat participant, annotated with the matching person when one is known. */
export interface Member {
  /** handle ROWID */
  id: number;
  /** Address as stored by the messaging database */
  contact: string;
  country: string | null;
  service: string | null;
  uuid?: string;
  name?: string;
}

export interface MessageAttachment {
  id: number;
  guid: string;
  /** Raw created_date value, as text so nanosecond values stay exact */
  date: string | null;
  createdAt: string | null;
  filename: string | null;
  uti: string | null;
  mimeType: string | null;
  transferName: string | null;
  totalBytes: number | null;
}

export interface ChatMessage {
  id: number;
  guid: string;
  /** Raw date value, as text so nanosecond values stay exact */
  date: string | null;
  sentAt: string | null;
  handleId: number;
  /** Sent from the device that was backed up */
  fromMe: boolean;
  text: string | null;
  replyToGuid: string | null;
  senderUuid?: string;
  senderName?: string;
  attachments: MessageAttachment[];
}

export interface Chat {
  id: number;
  guid: string;
  members: Member[];
}

export interface ChatWithMessages extends Chat {
  messages: ChatMessage[];
}

export interface MessagingExtraction {
  chats: ChatWithMessages[];
  /** Normalized contact strings that matched no person */
  unresolvedContacts: string[];
  /** Messages whose handle id is missing from the handle table */
  droppedMessages: number;
}
