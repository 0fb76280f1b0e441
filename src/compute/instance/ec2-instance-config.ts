import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";


export interface Ec2InstanceConfig
{
    imageId: string;
    instanceType: string;
    subnetId: Pulumi.Output<string>;
    securityGroupIds: ReadonlyArray<Pulumi.Output<string>>;
    /** default: false */
    associatePublicIpAddress?: boolean;
    provider?: aws.Provider;
}
