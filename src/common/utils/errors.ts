export class RenderScaleError extends Error { }

export class Errors {

  public static messageOf(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  public static formatBody(body: string): string {
    try {
      return JSON.stringify(JSON.parse(body), null, 2);
    } catch {
      return body;
    }
  }

}
