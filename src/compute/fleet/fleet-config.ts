import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";


export interface FleetConfig
{
    imageId: string;
    instanceType: string;
    securityGroupIds: ReadonlyArray<Pulumi.Output<string>>;
    subnetIds: ReadonlyArray<Pulumi.Output<string>>;
    // passed to the group as given, the group itself rejects out of order values
    minSize: number;
    maxSize: number;
    desiredCapacity: number;
    provider?: aws.Provider;
}
