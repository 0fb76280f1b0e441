import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import type { SecurityGroupRule } from "./security-group-rule.js";


export interface SecurityGroupConfig
{
    vpcId: Pulumi.Output<string>;
    ingressRules: ReadonlyArray<SecurityGroupRule>;
    description?: string;
    provider?: aws.Provider;
}
