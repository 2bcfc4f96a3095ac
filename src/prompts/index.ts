import type { AgentDescriptor } from "../modules/agents/types.js";

export const CLASSIFIER_SYSTEM_PROMPT = [
  "Tu es un routeur de questions pour un assistant destiné aux TPE et PME françaises.",
  "Tu choisis l'agent spécialisé le plus adapté à la question, ou \"none\" si aucun ne convient.",
  "Réponds uniquement avec un objet JSON valide, sans texte autour."
].join(" ");

export const buildClassifierPrompt = (input: {
  question: string;
  agents: ReadonlyArray<Pick<AgentDescriptor, "id" | "description">>;
}): string => {
  const agentLines = input.agents.map((agent) => `- ${agent.id}: ${agent.description}`);
  const allowed = [...input.agents.map((agent) => `"${agent.id}"`), "\"none\""].join(", ");

  return [
    "Agents disponibles :",
    ...agentLines,
    "",
    "Question de l'utilisateur :",
    input.question,
    "",
    "Format de réponse attendu :",
    "{\"agent\": <identifiant>, \"confidence\": <nombre entre 0 et 1>, \"reason\": <phrase courte>}",
    `Valeurs autorisées pour "agent" : ${allowed}.`
  ].join("\n");
};

export const RESPONDER_SYSTEM_PROMPT = [
  "Tu es un expert qui répond aux questions des entrepreneurs français.",
  "Réponds uniquement à partir des documents fournis.",
  "Si les documents ne permettent pas de répondre, dis-le clairement.",
  "Cite les sources utilisées à la fin de ta réponse.",
  "Sois précis et concis."
].join(" ");

export const NO_INFORMATION_ANSWER =
  "Je n'ai pas trouvé d'information pertinente sur ce sujet dans ma base de connaissances.";

export const buildResponderUserPrompt = (input: { question: string; context: string }): string =>
  ["DOCUMENTS DE RÉFÉRENCE :", input.context, "", "QUESTION :", input.question, "", "RÉPONSE :"].join("\n");

export const NOT_UNDERSTOOD_MESSAGE =
  "Je n'ai pas compris votre demande. Pouvez-vous préciser s'il s'agit de fiscalité, de comptabilité, de ressources humaines, de droit ou d'aides aux entreprises ?";

export const buildAgentUnavailableMessage = (agentId: string): string =>
  `L'agent « ${agentId} » n'est pas encore disponible. Nous travaillons à son ouverture.`;

export const FRIENDLY_ERROR_MESSAGES = {
  agent_unreachable: "Le service spécialisé ne répond pas pour le moment. Merci de réessayer dans quelques instants.",
  agent_auth: "Le service spécialisé est momentanément inaccessible. L'équipe technique a été prévenue.",
  agent_failure: "Le service spécialisé a rencontré une erreur. Merci de réessayer plus tard.",
  request_timeout: "La réponse prend trop de temps. Merci de reformuler ou de réessayer plus tard.",
  internal: "Une erreur inattendue est survenue. Merci de réessayer plus tard."
} as const;
