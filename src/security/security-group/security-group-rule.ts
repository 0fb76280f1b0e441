export interface SecurityGroupRule
{
    /** "tcp", "udp", "icmp" or "-1" for all */
    protocol: string;
    fromPort: number;
    toPort: number;
    cidrBlocks: ReadonlyArray<string>;
    description?: string;
}
