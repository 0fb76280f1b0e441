import * as aws from "@pulumi/aws";
import type { VpcSubnetConfig } from "./vpc-subnet-config.js";


export interface VpcConfig
{
    cidr16Bits: string;
    /** zones are `<region><az>`; default: StackConfig.awsRegion */
    region?: aws.Region;
    subnets: ReadonlyArray<VpcSubnetConfig>;
    provider?: aws.Provider;
}
