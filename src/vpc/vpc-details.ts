import * as Pulumi from "@pulumi/pulumi";


export interface VpcDetails
{
    vpcId: Pulumi.Output<string>;
    cidrBlock: string;
    /** in the order the subnets were configured */
    subnetIds: ReadonlyArray<Pulumi.Output<string>>;
}
