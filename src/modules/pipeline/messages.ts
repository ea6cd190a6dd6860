import type { Finding, IntakeBlockReason, PiiKind, ScopeDecision } from "../intake/types.js";
import type { FailureReason } from "./types.js";

const KIND_LABELS: Record<PiiKind, string> = {
  national_tax_id: "CPF",
  company_id: "CNPJ",
  email: "e-mail",
  phone: "telefone",
  case_number: "número de processo"
};

const FAILURE_MESSAGES: Record<FailureReason, string> = {
  InputRejected: "Não foi possível aceitar essa mensagem. Reformule a pergunta e tente novamente.",
  IndexUnavailable: "A base de consulta está indisponível no momento. Tente novamente mais tarde.",
  EmptyCorpus: "A base de consulta está vazia no momento. Tente novamente mais tarde.",
  EmbeddingMismatch: "A base de consulta está indisponível no momento. Tente novamente mais tarde.",
  NoEvidence: "Não encontrei fontes na base do Código de Defesa do Consumidor para responder a essa pergunta.",
  UnsupportedClaim: "Não foi possível gerar uma resposta verificada com as fontes disponíveis.",
  StructuralViolation: "Não foi possível gerar uma resposta verificada com as fontes disponíveis.",
  UpstreamUnavailable: "O serviço está temporariamente indisponível. Tente novamente em instantes.",
  Cancelled: "A solicitação foi cancelada.",
  InternalError: "Não foi possível concluir a resposta agora. Tente novamente."
};

export const failureMessage = (reason: FailureReason): string => FAILURE_MESSAGES[reason];

export function blockedMessage(reason: IntakeBlockReason, findings: readonly Finding[], scope: ScopeDecision | null): string {
  if (reason === "sensitive_data") {
    const labels = [
      ...new Set(findings.filter((finding) => finding.severity === "block").map((finding) => KIND_LABELS[finding.kind]))
    ];
    return `Sua mensagem contém dados pessoais (${labels.join(", ")}). Remova esses dados e envie a pergunta novamente.`;
  }

  if (scope?.domain === "adjacent-legal-domain") {
    return "Só consigo responder dúvidas sobre direito do consumidor. Para outras áreas do direito, procure um advogado ou a Defensoria Pública.";
  }
  return "Só consigo ajudar com dúvidas sobre direitos do consumidor, como compras, garantias, cobranças e serviços.";
}
