export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export const describeError = (error: unknown): { errorClass: string; message: string } => {
  if (error instanceof Error) {
    return { errorClass: error.name, message: error.message };
  }

  return { errorClass: "Error", message: String(error) };
};
