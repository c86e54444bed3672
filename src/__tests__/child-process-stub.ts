/**
 * Shared state for the manual child_process mock in src/__mocks__
 */

export interface StubbedCall {
  file: string;
  args: readonly string[];
  timeout?: number;
}

export interface StubbedFailure {
  message?: string;
  code?: string | number | null;
  killed?: boolean;
  signal?: string | null;
}

export interface StubbedResponse {
  stdout?: string;
  stderr?: string;
  error?: StubbedFailure;
  hang?: boolean; // never exit, like a child stuck on a dead disk
}

type Responder = (call: StubbedCall) => StubbedResponse;

const defaultResponder: Responder = () => ({ stdout: '' });

export const childProcessStub = {
  calls: new Array<StubbedCall>(),
  responder: defaultResponder,

  respondWith(responder: Responder): void {
    this.responder = responder;
  },

  reset(): void {
    this.calls = [];
    this.responder = defaultResponder;
  },
};
