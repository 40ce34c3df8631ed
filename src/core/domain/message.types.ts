export type ChatAuthor = {
  id: string;
  username: string;
  displayName?: string;
  automated: boolean;
};

export type ChatMessage = {
  id: string;
  author: ChatAuthor;
  content: string;
  createdAt: string;
};

export type AllowlistEntry = {
  id: string;
  label: string;
};

export type Interaction = {
  id: string;
  author: string;
  authorId: string;
  content: string;
  timestamp: string;
};
