export enum EnvType
{
    dev = "dev",
    stage = "stage",
    prod = "prod"
}
