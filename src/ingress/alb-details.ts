import * as Pulumi from "@pulumi/pulumi";


export interface AlbDetails
{
    loadBalancerArn: Pulumi.Output<string>;
    dnsName: Pulumi.Output<string>;
    targetGroupArn: Pulumi.Output<string>;
    listenerArn: Pulumi.Output<string>;
}
