export type ResponderSource = {
  titre: string;
  url: string;
};

export type ResponderInput = {
  question: string;
  requestId?: string;
  signal?: AbortSignal;
};

export type ResponderAnswer = {
  question: string;
  reponse: string;
  documents_trouves: number;
  sources: ResponderSource[];
};
