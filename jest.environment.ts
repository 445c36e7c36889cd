import NodeEnvironment from "jest-environment-node";

// Jest runs tests in a separate vm context, so errors thrown by Node's core
// modules (fs, etc.) fail `instanceof Error` against the sandbox's Error.
// Share the host realm's Error so the code sees them as it does under Node.
export default class HostErrorNodeEnvironment extends NodeEnvironment {
  async setup() {
    await super.setup();
    this.global.Error = Error;
  }
}
