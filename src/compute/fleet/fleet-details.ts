import * as Pulumi from "@pulumi/pulumi";


export interface FleetDetails
{
    launchTemplateId: Pulumi.Output<string>;
    autoScalingGroupName: Pulumi.Output<string>;
}
