import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";


export interface AlbConfig
{
    subnetIds: ReadonlyArray<Pulumi.Output<string>>;
    securityGroupIds: ReadonlyArray<Pulumi.Output<string>>;
    /** default: / */
    healthCheckPath?: string;
    /** groups whose instances are registered with the target group */
    autoScalingGroupNames?: ReadonlyArray<Pulumi.Output<string>>;
    provider?: aws.Provider;
}
