import * as Pulumi from "@pulumi/pulumi";


export interface Ec2InstanceDetails
{
    instanceId: Pulumi.Output<string>;
    /** empty when no public address is associated */
    publicIp: Pulumi.Output<string>;
}
