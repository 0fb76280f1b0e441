import * as aws from "@pulumi/aws";


export interface MachineImageQuery
{
    /** default: amzn2-ami-hvm-*-x86_64-gp2 */
    namePattern?: string;
    /** publisher alias; default: amazon */
    owner?: string;
    provider?: aws.Provider;
}
