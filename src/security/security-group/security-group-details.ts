import * as Pulumi from "@pulumi/pulumi";


export interface SecurityGroupDetails
{
    securityGroupId: Pulumi.Output<string>;
}
