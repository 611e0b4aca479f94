import { SEGMENT_SEPARATOR } from "./SmtpConstants";

export enum SmtpCapabilityType {
  Auth = "AUTH",
  Help = "HELP",
}

export enum SmtpAuthType {
  PLAIN = "PLAIN",
}

export class SmtpCapability {
  /**
   * Constructs a new capability.
   * @param type the type of capability.
   * @param args the arguments.
   */
  public constructor(
    public readonly type: SmtpCapabilityType,
    public readonly args: readonly string[] = []
  ) {}

  /**
   * Encodes the capability.
   * @returns the encoded capability, as advertised after a greeting.
   */
  public encode(): string {
    return [this.type, ...this.args].join(SEGMENT_SEPARATOR);
  }
}

/**
 * Capabilities advertised in the greeting response, in order.
 */
export const CAPABILITIES: readonly SmtpCapability[] = Object.freeze([
  new SmtpCapability(SmtpCapabilityType.Auth, [SmtpAuthType.PLAIN]),
  new SmtpCapability(SmtpCapabilityType.Help),
]);
