export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "PAYLOAD_TOO_LARGE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: {
  status: number;
  code: ProblemCode;
  detail?: string;
  instance?: string;
  errors?: FieldError[];
  requestId?: string;
}): Problem {
  return {
    type: `https://errors.tfidf-analyzer.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "PAYLOAD_TOO_LARGE":
      return "Payload too large";
    case "NOT_FOUND":
      return "Not found";
    case "METHOD_NOT_ALLOWED":
      return "Method not allowed";
    case "INTERNAL":
      return "Internal error";
  }
}
